export type GameErrorCode = 'INVALID_MOVE' | 'NOT_AI_TURN' | 'MALFORMED_STATE';

export class GameError extends Error {
  readonly code: GameErrorCode;

  constructor(code: GameErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidMoveError extends GameError {
  constructor(message = 'Illegal move') {
    super('INVALID_MOVE', message);
  }
}

export class NotAITurnError extends GameError {
  constructor(message = 'It is not the computer\'s turn') {
    super('NOT_AI_TURN', message);
  }
}

/** Raised by `decode` with one entry per problem found in the input. */
export class MalformedStateError extends GameError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('MALFORMED_STATE', `Malformed game state: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export function isGameError(value: unknown): value is GameError {
  return value instanceof GameError;
}
