import type { Glyph, Master } from '../types/font';

export type GlyphCase = 'uppercase' | 'lowercase' | 'figure';

export interface GlyphCategory {
  category?: string;
  subCategory?: string;
}

/** Category and subcategory from the Unicode general category of a codepoint. */
export function categoryFromCodepoint(codepoint: number): GlyphCategory {
  const char = String.fromCodePoint(codepoint);
  if (/\p{Lu}/u.test(char)) {
    return { category: 'Letter', subCategory: 'Uppercase' };
  }
  if (/\p{Ll}/u.test(char)) {
    return { category: 'Letter', subCategory: 'Lowercase' };
  }
  if (/\p{L}/u.test(char)) {
    return { category: 'Letter' };
  }
  if (/\p{Nd}/u.test(char)) {
    return { category: 'Number', subCategory: 'Decimal Digit' };
  }
  if (/\p{M}/u.test(char)) {
    return { category: 'Mark' };
  }
  if (/\p{P}/u.test(char)) {
    return { category: 'Punctuation' };
  }
  if (/\p{S}/u.test(char)) {
    return { category: 'Symbol' };
  }
  return {};
}

/**
 * Subcategory wins over the glyph's codepoint; a glyph with neither is
 * unclassified.
 */
export function classifyGlyph(glyph: Glyph): GlyphCase | null {
  const declared: GlyphCategory = glyph.category ? glyph : glyph.unicode !== undefined ? categoryFromCodepoint(glyph.unicode) : {};

  if (declared.category === 'Number' || declared.subCategory === 'Decimal Digit') {
    return 'figure';
  }
  if (declared.category === 'Letter') {
    if (declared.subCategory === 'Uppercase') {
      return 'uppercase';
    }
    if (declared.subCategory === 'Lowercase') {
      return 'lowercase';
    }
  }
  return null;
}

export function isLetter(glyph: Glyph): boolean {
  const declared: GlyphCategory = glyph.category ? glyph : glyph.unicode !== undefined ? categoryFromCodepoint(glyph.unicode) : {};
  return declared.category === 'Letter';
}

/** "a.sc" and "a.alt" share the patterns of "a" */
export function baseGlyphName(name: string): string {
  return name.split('.')[0];
}

export interface Zone {
  bottom: number;
  height: number;
}

export function glyphZone(glyphCase: GlyphCase | null, master: Master): Zone {
  const height = glyphCase === 'lowercase' ? master.metrics.xHeight : master.metrics.capHeight;
  return { bottom: 0, height };
}

/** Straight reference glyph whose stem and colour the rest of the case is measured against. */
export function referenceGlyphName(glyphCase: GlyphCase | null): string {
  return glyphCase === 'lowercase' ? 'n' : 'H';
}
