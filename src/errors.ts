export class RunSummaryValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RunSummaryValidationError";
  }
}

// Tokens spent up to and including the call that went over.
export class BudgetExceededError extends Error {
  readonly used: number;

  constructor(
    readonly limit: number,
    readonly tokensIn: number,
    readonly tokensOut: number,
  ) {
    super(`Token budget exceeded: used ${tokensIn + tokensOut} of ${limit}`);
    this.name = "BudgetExceededError";
    this.used = tokensIn + tokensOut;
  }
}
