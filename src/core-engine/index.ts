/**
 * Core Engine Module
 *
 * Host-facing plumbing shared by games: typed events, undo/redo,
 * logging, and the CardView projection.
 */
export const ENGINE_VERSION = '0.1.0';

// Undo/Redo system
export type { Command } from './UndoRedoManager';
export { CompoundCommand, UndoRedoManager } from './UndoRedoManager';

// Game event system
export type { GameEventListener } from './GameEventEmitter';
export { GameEventEmitter } from './GameEventEmitter';

// Logging
export type {
  LogLevel,
  Logger,
  ConsoleLike,
  ConsoleLoggerOptions,
} from './Logger';
export { createConsoleLogger, silentLogger } from './Logger';

// Card projections
export type { CardView } from './TranscriptTypes';
export { toCardView } from './TranscriptTypes';
