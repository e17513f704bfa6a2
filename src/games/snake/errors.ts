export type GameErrorCode =
  | 'INVALID_CONFIG'
  | 'INVARIANT_VIOLATION';

export class GameError extends Error {
  readonly code: GameErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: GameErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
  }
}
