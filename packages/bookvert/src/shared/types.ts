/**
 * Bookvert shared types
 * Platform-agnostic - no OS-specific code
 */

// ============================================================================
// Configuration
// ============================================================================

export type Manga = 'Yes' | 'No' | 'YesAndRightToLeft';

export const MANGA_VALUES: readonly Manga[] = ['Yes', 'No', 'YesAndRightToLeft'];

export interface ComicMetadata {
  series?: string;
  author?: string;     // <Writer>
  artist?: string;     // <Penciller>
  publisher?: string;
  genre?: string;      // comma-separated
  language?: string;   // ISO code, e.g. "en", "ja"
  manga?: Manga;
  summary?: string;
}

export interface BookvertConfig {
  // Output directory for .cbz files
  out: string;
  // Overwrite existing archives
  force: boolean;
  // Pick selectors, in declaration order
  pick: string[];
  // Regexes for directory names to skip while scanning
  skip: string[];
  // Ranges of catalogue numbers to keep (empty = keep all)
  include: string[];
  // Ask the operator when no pick rule resolves a catalogue
  interactive: boolean;
  // Zero-pad width for the catalogue number in output names
  pad: number;
  metadata: ComicMetadata;
}

// ============================================================================
// Scanner output
// ============================================================================

export interface PageFile {
  path: string;        // absolute path of the image
  ext: string;         // normalised lowercase extension, no dot
  bytes: number;
}

/** One discovered book directory, in scan order. */
export interface ScannedBook {
  path: string;
  name: string;        // final path segment
  pageCount: number;
  bytes?: number;      // total bytes of all pages
  pages?: PageFile[];
}
