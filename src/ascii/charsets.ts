/**
 * Glyph palettes ordered from the glyph drawn for the darkest pixel to the one
 * drawn for the brightest. Each index must be at least as visually dense as
 * the one before it.
 */
export const CHARACTER_SETS = {
  dense: [" ", ".", ",", ":", ";", "+", "*", "?", "%", "S", "#", "@"],
  simple: [" ", ".", "-", "+", "*", "#", "@"],
  blocks: [" ", "▏", "▎", "▍", "▌", "▋", "▊", "▉", "█"],
  minimal: [" ", "░", "▒", "▓", "█"],
} as const satisfies Record<string, readonly string[]>;

export type CharacterSetName = keyof typeof CHARACTER_SETS;

export interface CharacterSet {
  readonly name: CharacterSetName;
  readonly glyphs: readonly string[];
}

const setNames = Object.keys(CHARACTER_SETS) as CharacterSetName[];

export function isCharacterSetName(value: string): value is CharacterSetName {
  return Object.hasOwn(CHARACTER_SETS, value);
}

export function getCharacterSet(name: CharacterSetName): CharacterSet {
  return { name, glyphs: CHARACTER_SETS[name] };
}

export function getNextCharacterSet(current: CharacterSetName): CharacterSetName {
  const idx = setNames.indexOf(current);
  return setNames[(idx + 1) % setNames.length] ?? current;
}

export function getPreviousCharacterSet(current: CharacterSetName): CharacterSetName {
  const idx = setNames.indexOf(current);
  return setNames[(idx - 1 + setNames.length) % setNames.length] ?? current;
}

export function getCharacterSetNames(): CharacterSetName[] {
  return [...setNames];
}

export function displayName(name: CharacterSetName): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}
