/**
 * Linear undo/redo history for the solitaire engine.
 *
 * Moves are applied by the engine before they reach the history, so the
 * manager only records them. A command restores the state after its
 * move on `execute()` and the state before it on `undo()`; a
 * CompoundCommand makes a whole batch of moves one step.
 */

// ── Commands ────────────────────────────────────────────────

/**
 * A step of history that can be replayed forward and backward.
 */
export interface Command {
  /** Re-apply the step (redo). */
  execute(): void;
  /** Revert the step. */
  undo(): void;
  /** Human-readable label, e.g. `draw`. */
  readonly description?: string;
}

/**
 * Several commands undone and redone as one step: forward in order,
 * backward in reverse order.
 */
export class CompoundCommand implements Command {
  private readonly commands: readonly Command[];

  constructor(
    commands: readonly Command[],
    readonly description?: string,
  ) {
    if (commands.length === 0) {
      throw new Error('CompoundCommand requires at least one sub-command');
    }
    this.commands = [...commands];
  }

  execute(): void {
    for (const command of this.commands) {
      command.execute();
    }
  }

  undo(): void {
    for (let i = this.commands.length - 1; i >= 0; i--) {
      this.commands[i].undo();
    }
  }
}

// ── UndoRedoManager ─────────────────────────────────────────

/**
 * Undo and redo stacks over already-applied commands.
 *
 * Recording a command clears the redo stack. `limit` caps the undo
 * stack; the oldest step is dropped first.
 */
export class UndoRedoManager {
  private readonly undoStack: Command[] = [];
  private readonly redoStack: Command[] = [];

  constructor(private readonly limit: number = Infinity) {
    if (!(limit > 0)) {
      throw new Error(`Undo history limit must be positive, got ${limit}`);
    }
  }

  /** Push a command whose effect is already in place. */
  record(command: Command): void {
    this.undoStack.push(command);
    if (this.undoStack.length > this.limit) {
      this.undoStack.shift();
    }
    this.redoStack.length = 0;
  }

  /** Revert the newest step; `undefined` when there is none. */
  undo(): Command | undefined {
    const command = this.undoStack.pop();
    if (command === undefined) return undefined;
    command.undo();
    this.redoStack.push(command);
    return command;
  }

  /** Re-apply the newest undone step; `undefined` when there is none. */
  redo(): Command | undefined {
    const command = this.redoStack.pop();
    if (command === undefined) return undefined;
    command.execute();
    this.undoStack.push(command);
    return command;
  }

  canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }
}
