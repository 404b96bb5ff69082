export type TableStitcherErrorCode = 'UNKNOWN_STRATEGY' | 'INVALID_SCORE_DOMAIN';

export class TableStitcherError extends Error {
  readonly code: TableStitcherErrorCode;

  constructor(code: TableStitcherErrorCode, message: string) {
    super(message);
    this.name = 'TableStitcherError';
    this.code = code;
  }
}

export class UnknownStrategyError extends TableStitcherError {
  readonly strategy: string;

  constructor(strategy: string) {
    super('UNKNOWN_STRATEGY', `Unknown segmentation strategy: ${strategy}`);
    this.name = 'UnknownStrategyError';
    this.strategy = strategy;
  }
}

export class InvalidScoreDomainError extends TableStitcherError {
  constructor(message: string) {
    super('INVALID_SCORE_DOMAIN', message);
    this.name = 'InvalidScoreDomainError';
  }
}
