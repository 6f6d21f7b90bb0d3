import type { Message, Piece, SubMessagePiece } from '../types/messages';

export class IllegalInterpolationError extends Error {
  readonly piece: unknown;

  constructor(piece: unknown) {
    super(`Illegal interpolation: ${JSON.stringify(piece)}`);
    this.name = 'IllegalInterpolationError';
    this.piece = piece;
  }
}

const PLURAL_CLAUSE_ORDER = ['zero', 'one', 'two', 'few', 'many', 'other'];
const GENDER_CLAUSE_ORDER = ['female', 'male', 'other'];

// Plural categories that ICU writes as exact matches
const PLURAL_ICU_KEYS: Record<string, string> = {
  zero: '=0',
  one: '=1',
  two: '=2',
};

/**
 * Quote the ICU metacharacters of a literal. Not idempotent: apply once per
 * nesting level.
 */
export function escapeIcu(text: string): string {
  return text
    .replace(/'/g, "''")
    .replace(/\{/g, "'{'")
    .replace(/\}/g, "'}'");
}

function orderedClauses(sub: SubMessagePiece) {
  const order =
    sub.selector === 'plural'
      ? PLURAL_CLAUSE_ORDER
      : sub.selector === 'gender'
        ? GENDER_CLAUSE_ORDER
        : null;
  if (order == null) {
    return sub.clauses;
  }
  const known = order.flatMap(key =>
    sub.clauses.filter(clause => clause.key === key),
  );
  const unknown = sub.clauses.filter(clause => !order.includes(clause.key));
  return [...known, ...unknown];
}

function icuClauseKey(sub: SubMessagePiece, key: string): string {
  if (sub.selector === 'plural') {
    return PLURAL_ICU_KEYS[key] ?? key;
  }
  return key;
}

function renderPieces(
  pieces: Piece[],
  args: string[],
  shouldEscapeIcu: boolean,
): string {
  return pieces
    .map(piece => renderPiece(piece, args, shouldEscapeIcu))
    .join('');
}

function renderPiece(
  piece: Piece,
  args: string[],
  shouldEscapeIcu: boolean,
): string {
  switch (piece.type) {
    case 'literal':
      return shouldEscapeIcu ? escapeIcu(piece.value) : piece.value;
    case 'placeholder':
      if (
        Number.isInteger(piece.index) &&
        piece.index >= 0 &&
        piece.index < args.length
      ) {
        return `{${args[piece.index]}}`;
      }
      throw new IllegalInterpolationError(piece);
    case 'sub-message': {
      const icuType = piece.selector === 'plural' ? 'plural' : 'select';
      // Clause bodies sit inside a selector, so every descendant literal is escaped
      const clauses = orderedClauses(piece)
        .map(
          clause =>
            `${icuClauseKey(piece, clause.key)}{${renderPieces(clause.pieces, args, true)}}`,
        )
        .join('');
      return `{${piece.argument},${icuType}, ${clauses}}`;
    }
    default: {
      const unexpected: never = piece;
      throw new IllegalInterpolationError(unexpected);
    }
  }
}

/**
 * Render a message with ICU `{argument}` placeholders and
 * `{argument,plural, ...}` / `{argument,select, ...}` selectors.
 */
export function icuForm(
  message: Pick<Message, 'pieces' | 'arguments'>,
): string {
  return renderPieces(message.pieces, message.arguments, false);
}
