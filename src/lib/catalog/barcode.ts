/**
 * Barcode checks (EAN-8 .. GTIN-14, digits only)
 */

const DIGITS = /^\d+$/;
const FOOD_PREFIXES = ['3', '4', '5', '6', '7', '8', '9'];

export function isValidBarcode(barcode: string): boolean {
  return barcode.length >= 8 && barcode.length <= 14 && DIGITS.test(barcode);
}

export function isValidEan13(barcode: string): boolean {
  if (barcode.length !== 13 || !DIGITS.test(barcode)) return false;

  let sum = 0;
  for (let i = 0; i < 12; i++) {
    const digit = Number(barcode[i]);
    sum += i % 2 === 0 ? digit : digit * 3;
  }
  const checkDigit = (10 - (sum % 10)) % 10;
  return checkDigit === Number(barcode[12]);
}

/** Rough heuristic: EAN-13 with a prefix commonly used for groceries */
export function isLikelyFoodProduct(barcode: string): boolean {
  if (barcode.length !== 13) return false;
  return FOOD_PREFIXES.some((prefix) => barcode.startsWith(prefix));
}
