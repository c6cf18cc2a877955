/**
 * Money Types
 */

/**
 * Fixed-point amount: an integer count of minor currency units
 * (12345 == "123.45"). Decimal strings are converted at the edges.
 */
export type Cents = number;

/**
 * ISO 4217 currency code
 */
export type CurrencyCode = string;
