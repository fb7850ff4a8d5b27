/**
 * Indian Currency Normalization
 *
 * Converts lakh/crore magnitudes written in report text ("Rs. 50.5 Lakhs",
 * "1,250 Crore") into absolute values.
 */

export const LAKH = 1e5;
export const CRORE = 1e7;

const UNIT_MULTIPLIERS: Record<string, number> = {
  lakh: LAKH,
  lakhs: LAKH,
  crore: CRORE,
  crores: CRORE,
};

/**
 * Amount followed by a unit. Digit groups may use Indian comma placement
 * (1,25,000); whitespace between amount and unit is optional. A bare decimal
 * (.5 Crore) counts unless the dot closes an abbreviation such as "Rs.".
 */
const AMOUNT_WITH_UNIT_PATTERN =
  /(\d[\d,]*(?:\.\d+)?|(?<![A-Za-z.])\.\d+)\s*(lakhs?|crores?)\b/gi;

/**
 * Return every lakh/crore amount in the text as an absolute value, in order of appearance.
 */
export function parseIndianCurrency(text: string): number[] {
  const values: number[] = [];

  for (const match of text.matchAll(AMOUNT_WITH_UNIT_PATTERN)) {
    const amount = parseFloat(match[1].replace(/,/g, ''));
    const multiplier = UNIT_MULTIPLIERS[match[2].toLowerCase()];
    if (Number.isFinite(amount) && multiplier !== undefined) {
      values.push(amount * multiplier);
    }
  }

  return values;
}

