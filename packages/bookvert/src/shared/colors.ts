import { createColors, isColorSupported } from 'colorette';

export type Palette = ReturnType<typeof createColors>;

export function palette(useColor: boolean = isColorSupported): Palette {
  return createColors({ useColor });
}
