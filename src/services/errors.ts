/** A snapshot was requested without a price for every held or borrowed coin. */
export class MissingPricesError extends Error {
  constructor(readonly coins: string[]) {
    super(`Missing prices for coins: ${coins.join(", ")}`);
    this.name = "MissingPricesError";
  }
}

export default MissingPricesError;
