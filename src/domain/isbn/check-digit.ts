// ---------------------------------------------------------------------------
// ISBN check-digit arithmetic.
// ---------------------------------------------------------------------------

/**
 * Compute the ISBN-10 check character for exactly 9 digits.
 * Returns '0'-'9' or 'X'.
 */
export function computeISBN10CheckDigit(first9: string): string {
  if (!/^\d{9}$/.test(first9)) {
    throw new Error(`Expected 9 digits, got "${first9}"`);
  }

  let sum = 0;
  for (let i = 0; i < 9; i++) {
    sum += (10 - i) * Number(first9[i]);
  }

  const check = (11 - (sum % 11)) % 11;
  return check === 10 ? "X" : String(check);
}

/**
 * Compute the ISBN-13 check digit for exactly 12 digits.
 */
export function computeISBN13CheckDigit(first12: string): string {
  if (!/^\d{12}$/.test(first12)) {
    throw new Error(`Expected 12 digits, got "${first12}"`);
  }

  let sum = 0;
  for (let i = 0; i < 12; i++) {
    sum += (i % 2 === 0 ? 1 : 3) * Number(first12[i]);
  }

  return String((10 - (sum % 10)) % 10);
}

/**
 * Pure ISBN-10 checksum: weights 10..2 over the first nine digits plus the
 * check value ('X' = 10), valid iff the total is divisible by 11.
 */
export function hasValidISBN10Checksum(isbn10: string): boolean {
  const value = isbn10.toUpperCase();
  if (!/^\d{9}[\dX]$/.test(value)) return false;

  let sum = 0;
  for (let i = 0; i < 9; i++) {
    sum += (10 - i) * Number(value[i]);
  }
  sum += value[9] === "X" ? 10 : Number(value[9]);

  return sum % 11 === 0;
}

/**
 * Pure ISBN-13 checksum. Only the Bookland prefixes 978 and 979 qualify.
 */
export function hasValidISBN13Checksum(isbn13: string): boolean {
  if (!/^97[89]\d{10}$/.test(isbn13)) return false;
  return computeISBN13CheckDigit(isbn13.slice(0, 12)) === isbn13[12];
}
