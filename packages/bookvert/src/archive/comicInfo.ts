/**
 * ComicInfo.xml generation for readers that understand it.
 */

import type { ComicMetadata } from '../shared/types.js';

export function xmlEscape(input: string): string {
  return input.replace(/[&<>"']/g, ch => {
    switch (ch) {
      case '&': return '&amp;';
      case '<': return '&lt;';
      case '>': return '&gt;';
      case '"': return '&quot;';
      default: return '&apos;';
    }
  });
}

export interface ComicInfoInput {
  title: string;
  series: string;
  number: number | undefined;
  pageCount: number;
  metadata: ComicMetadata;
}

export function comicInfoXml(input: ComicInfoInput): string {
  const { metadata } = input;
  const lines = [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<ComicInfo xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" xmlns:xsd="http://www.w3.org/2001/XMLSchema">',
    `  <Title>${xmlEscape(input.title)}</Title>`,
    `  <Series>${xmlEscape(metadata.series ?? input.series)}</Series>`,
  ];
  if (input.number !== undefined) lines.push(`  <Number>${input.number}</Number>`);
  lines.push(`  <PageCount>${input.pageCount}</PageCount>`);

  const optional: Array<[string, string | undefined]> = [
    ['Writer', metadata.author],
    ['Penciller', metadata.artist],
    ['Publisher', metadata.publisher],
    ['Genre', metadata.genre],
    ['LanguageISO', metadata.language],
    ['Manga', metadata.manga],
    ['Summary', metadata.summary],
  ];
  for (const [tag, value] of optional) {
    if (value !== undefined && value !== '') lines.push(`  <${tag}>${xmlEscape(value)}</${tag}>`);
  }

  lines.push('</ComicInfo>');
  return lines.join('\n') + '\n';
}
