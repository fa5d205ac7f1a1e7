// src/core/rain/charset.ts

const HALF_WIDTH_KATAKANA_FIRST = 0xff66;
const HALF_WIDTH_KATAKANA_LAST = 0xff9d;

const codePointRange = (first: number, last: number): number[] => {
  const out: number[] = [];
  for (let cp = first; cp <= last; cp++) out.push(cp);
  return out;
};

/**
 * Code points a streak may contain: half-width katakana (U+FF66..U+FF9D)
 * followed by the ASCII digits. The atlas baker packs the same set.
 */
export const RAIN_CODE_POINTS: readonly number[] = [
  ...codePointRange(HALF_WIDTH_KATAKANA_FIRST, HALF_WIDTH_KATAKANA_LAST),
  ...codePointRange(0x30, 0x39),
];
