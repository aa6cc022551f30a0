/** What the user picked. `directory` is `''` when no directory was chosen. */
export interface FileSelection {
  readonly files: readonly string[];
  readonly directory: string;
}

/**
 * Port for the file-picking component of a UI.
 *
 * The orchestrator reads the selection from it and clears it whenever the
 * session returns to file selection.
 */
export interface FileSelector {
  getSelection(): FileSelection;
  clearAll(): void;
}
