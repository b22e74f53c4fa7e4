export class NegativeGrowthException extends Error {
  readonly requested: number;

  constructor(requested: number) {
    super(`negative growth requested: ${requested}`);
    this.name = 'NegativeGrowthException';
    this.requested = requested;
  }
}
