/**
 * Move messages: the serializable form of a Move.
 *
 * The engine does no transport work. It only turns moves into flat
 * records (variant tag plus card, source pile and destination pile) and
 * back, so a host can relay them between peers. A decoded remote move
 * goes through the same `proposeMove` path as a local one.
 *
 * @example
 * ```ts
 * const text = serializeMove({ kind: 'stock-to-waste' });
 * // '{"v":1,"type":"stock-to-waste","card":null,"from":"stock","to":"waste"}'
 * const decoded = parseMove(text);
 * if (decoded.ok) proposeMove(world, decoded.value);
 * ```
 */

import { z } from 'zod';
import { RANKS, SUITS } from '../card-system/Card';
import type { Card } from '../card-system/Card';
import type { Result } from '../rule-engine/Result';
import { err, ok } from '../rule-engine/Result';
import type { Move, MoveKind, PileId, PileKind } from './SolitaireState';
import {
  PILE_IDS,
  foundationId,
  pileKindOf,
  tableauId,
} from './SolitaireState';

/** Current message format version. */
export const MOVE_MESSAGE_VERSION = 1;

export const MOVE_KINDS = [
  'tableau-to-tableau',
  'tableau-to-foundation',
  'foundation-to-tableau',
  'stock-to-waste',
  'recycle-waste',
  'waste-to-tableau',
  'waste-to-foundation',
] as const satisfies readonly MoveKind[];

// ── Schema ──────────────────────────────────────────────────

const CardSchema = z.object({
  rank: z.enum(RANKS),
  suit: z.enum(SUITS),
});

export const MoveMessageSchema = z.object({
  v: z.literal(MOVE_MESSAGE_VERSION),
  type: z.enum(MOVE_KINDS),
  card: CardSchema.nullable(),
  from: z.enum(PILE_IDS).nullable(),
  to: z.enum(PILE_IDS).nullable(),
});

/** Wire record of a move. Absent operands are `null`. */
export type MoveMessage = z.infer<typeof MoveMessageSchema>;

// ── Errors ──────────────────────────────────────────────────

/**
 * Why a message could not be turned into a move.
 *
 * - `malformed-json`   -- the text is not JSON.
 * - `invalid-shape`    -- the value does not match the record schema.
 * - `invalid-operands` -- the record is well-formed but its piles or
 *                         card do not fit the move type.
 */
export type MoveDecodeReason =
  | 'malformed-json'
  | 'invalid-shape'
  | 'invalid-operands';

export interface MoveDecodeError {
  readonly reason: MoveDecodeReason;
  readonly message: string;
}

function decodeError(
  reason: MoveDecodeReason,
  message: string,
): Result<never, MoveDecodeError> {
  return err({ reason, message });
}

// ── Encoding ────────────────────────────────────────────────

function record(
  type: MoveKind,
  card: Card | null,
  from: PileId | null,
  to: PileId | null,
): MoveMessage {
  return {
    v: MOVE_MESSAGE_VERSION,
    type,
    card: card ? { rank: card.rank, suit: card.suit } : null,
    from,
    to,
  };
}

/** Flatten a move into its wire record. */
export function encodeMove(move: Move): MoveMessage {
  switch (move.kind) {
    case 'tableau-to-tableau':
      return record(
        move.kind,
        move.card,
        tableauId(move.from),
        tableauId(move.to),
      );
    case 'tableau-to-foundation':
      return record(move.kind, move.card, null, foundationId(move.to));
    case 'foundation-to-tableau':
      return record(
        move.kind,
        move.card,
        foundationId(move.from),
        tableauId(move.to),
      );
    case 'stock-to-waste':
      return record(move.kind, null, 'stock', 'waste');
    case 'recycle-waste':
      return record(move.kind, null, 'waste', 'stock');
    case 'waste-to-tableau':
      return record(move.kind, move.card, 'waste', tableauId(move.to));
    case 'waste-to-foundation':
      return record(move.kind, move.card, 'waste', foundationId(move.to));
  }
}

/** Encode a move as JSON text. */
export function serializeMove(move: Move): string {
  return JSON.stringify(encodeMove(move));
}

// ── Decoding ────────────────────────────────────────────────

type Operand<K extends PileKind['kind']> = Extract<PileKind, { kind: K }>;

function pileOf<K extends PileKind['kind']>(
  id: PileId | null,
  kind: K,
): Operand<K> | null {
  if (id === null) return null;
  const pile = pileKindOf(id);
  return isKind(pile, kind) ? pile : null;
}

function isKind<K extends PileKind['kind']>(
  pile: PileKind,
  kind: K,
): pile is Operand<K> {
  return pile.kind === kind;
}

/** A fixed pile operand may be omitted (`null`) or must name that pile. */
function fixedPile(id: PileId | null, expected: PileId): boolean {
  return id === null || id === expected;
}

function toMove(message: MoveMessage): Move | string {
  const { type, card, from, to } = message;
  const cardless = `${type} needs a card`;

  switch (type) {
    case 'stock-to-waste':
      return fixedPile(from, 'stock') && fixedPile(to, 'waste')
        ? { kind: type }
        : `${type} runs from stock to waste`;
    case 'recycle-waste':
      return fixedPile(from, 'waste') && fixedPile(to, 'stock')
        ? { kind: type }
        : `${type} runs from waste to stock`;
    case 'tableau-to-tableau': {
      const source = pileOf(from, 'tableau');
      const target = pileOf(to, 'tableau');
      if (!card) return cardless;
      if (!source || !target) {
        return `${type} needs tableau source and destination`;
      }
      return { kind: type, card, from: source.index, to: target.index };
    }
    case 'tableau-to-foundation': {
      const target = pileOf(to, 'foundation');
      if (!card) return cardless;
      if (from !== null && !pileOf(from, 'tableau')) {
        return `${type} must come from the tableau`;
      }
      if (!target) return `${type} needs a foundation destination`;
      return { kind: type, card, to: target.suit };
    }
    case 'foundation-to-tableau': {
      const source = pileOf(from, 'foundation');
      const target = pileOf(to, 'tableau');
      if (!card) return cardless;
      if (!source || !target) {
        return `${type} needs foundation source and tableau destination`;
      }
      return { kind: type, card, from: source.suit, to: target.index };
    }
    case 'waste-to-tableau': {
      const target = pileOf(to, 'tableau');
      if (!card) return cardless;
      if (!fixedPile(from, 'waste') || !target) {
        return `${type} needs waste source and tableau destination`;
      }
      return { kind: type, card, to: target.index };
    }
    case 'waste-to-foundation': {
      const target = pileOf(to, 'foundation');
      if (!card) return cardless;
      if (!fixedPile(from, 'waste') || !target) {
        return `${type} needs waste source and foundation destination`;
      }
      return { kind: type, card, to: target.suit };
    }
  }
}

/**
 * Validate an already-parsed value as a move record and convert it.
 */
export function decodeMove(value: unknown): Result<Move, MoveDecodeError> {
  const parsed = MoveMessageSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where =
      issue && issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ` : '';
    return decodeError(
      'invalid-shape',
      `${where}${issue?.message ?? 'invalid move record'}`,
    );
  }

  const move = toMove(parsed.data);
  return typeof move === 'string'
    ? decodeError('invalid-operands', move)
    : ok(move);
}

/** Decode a move from JSON text. */
export function parseMove(text: string): Result<Move, MoveDecodeError> {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (e) {
    return decodeError(
      'malformed-json',
      e instanceof Error ? e.message : 'unparseable move message',
    );
  }
  return decodeMove(value);
}
