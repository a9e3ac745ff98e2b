import { InvalidTurnsError } from '../types/error.js';
import { ROLES, type Role, type Turn, type TurnInput } from '../types/model.js';

const KNOWN_ROLES: ReadonlySet<string> = new Set(ROLES);

function isRole(value: string): value is Role {
  return KNOWN_ROLES.has(value);
}

/**
 * Checks a conversation before anything is sent to a backend.
 * Throws InvalidTurnsError on an empty sequence, an unknown role or
 * non-text content.
 */
export function validateTurns(turns: ReadonlyArray<TurnInput>): ReadonlyArray<Turn> {
  if (turns.length === 0) {
    throw new InvalidTurnsError('conversation must contain at least one turn');
  }

  return turns.map((turn, index) => {
    if (typeof turn.role !== 'string' || !isRole(turn.role)) {
      throw new InvalidTurnsError(`turn ${index} has unrecognized role '${String(turn.role)}'`);
    }
    if (typeof turn.content !== 'string') {
      throw new InvalidTurnsError(`turn ${index} content must be a string`);
    }
    return { role: turn.role, content: turn.content };
  });
}
