/**
 * Solitaire Module
 *
 * Klondike on the ECS core: layout, move engine, status detection,
 * auto-play, move messages, sessions, transcripts and replay.
 */
export const SOLITAIRE_VERSION = '0.1.0';

// State types and pile ids
export type {
  TableauIndex,
  PileKind,
  PileId,
  Move,
  MoveKind,
  TableauToTableauMove,
  TableauToFoundationMove,
  FoundationToTableauMove,
  StockToWasteMove,
  RecycleWasteMove,
  WasteToTableauMove,
  WasteToFoundationMove,
  GameStatus,
  IllegalMoveReason,
  IllegalMove,
  AppliedMove,
  MoveOutcome,
  BoardSnapshot,
} from './SolitaireState';
export {
  TABLEAU_COUNT,
  FOUNDATION_COUNT,
  CARDS_PER_FOUNDATION,
  FOUNDATION_SUITS,
  TABLEAU_INDICES,
  PILE_IDS,
  tableauId,
  foundationId,
  pileIdOf,
  pileKindOf,
} from './SolitaireState';

// Configuration and errors
export type { EmptyTableauRule, GameOptions, RuleSet } from './SolitaireOptions';
export {
  EMPTY_TABLEAU_RULES,
  GameOptionsSchema,
  SeedSchema,
  resolveRules,
  validateSeed,
} from './SolitaireOptions';
export { SeedError, LayoutError, InvariantError } from './errors';

// World
export type {
  PileMembership,
  GameProgress,
  SolitaireComponents,
  SolitaireWorld,
} from './SolitaireComponents';
export { createSolitaireWorld } from './SolitaireComponents';
export { findPile, cardsInPile, topCard, findCard } from './PileQueries';

// Layout, rules, status
export {
  dealBoard,
  buildLayout,
  buildFromBoard,
  tableauSizes,
} from './SolitaireLayout';
export type { MovePlan, MoveCheck } from './SolitaireRules';
export {
  checkMove,
  isLegalMove,
  applyMove,
  getLegalMoves,
  isStockMove,
} from './SolitaireRules';
export { isWon, canRecycle, detectStatus } from './SolitaireStatus';
export { validateBoard, checkInvariants } from './SolitaireInvariants';
export {
  isSafeToFoundation,
  findSafeAutoMoves,
  isTriviallyWinnable,
  getAutoCompleteMoves,
} from './SolitaireAutoPlay';

// Embedding boundary
export type { BoundaryOptions } from './ReleaseMode';
export { isInternalError } from './ReleaseMode';
export {
  newGame,
  restoreGame,
  proposeMove,
  queryState,
  queryPile,
  snapshotBoard,
} from './SolitaireGame';

// Move messages
export type {
  MoveMessage,
  MoveDecodeReason,
  MoveDecodeError,
} from './MoveMessage';
export {
  MOVE_MESSAGE_VERSION,
  MOVE_KINDS,
  MoveMessageSchema,
  encodeMove,
  decodeMove,
  serializeMove,
  parseMove,
} from './MoveMessage';

// Session
export type {
  MoveSource,
  SolitaireEventMap,
  SessionOptions,
} from './SolitaireSession';
export { SolitaireSession, describeMove } from './SolitaireSession';

// Transcripts
export type {
  PlayerMoveRecord,
  PlayerBatchRecord,
  AutoMovesRecord,
  UndoRecord,
  RedoRecord,
  TranscriptEntry,
  GameResult,
  GameTranscript,
} from './GameTranscript';
export { TranscriptRecorder } from './GameTranscript';
export type {
  ReplayFailure,
  ReplayError,
  ReplayOptions,
} from './TranscriptReplay';
export { replayTranscript, sameBoard } from './TranscriptReplay';
