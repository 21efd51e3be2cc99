/**
 * Shared constants for the terminal UI
 */

// ============================================================================
// ANSI Escape Codes
// ============================================================================

export const RESET = '\x1b[0m';
export const YELLOW = '\x1b[33m';

// ============================================================================
// Keys (terminal-kit key names)
// ============================================================================

export const QUIT_KEYS: ReadonlySet<string> = new Set(['q', 'CTRL_C']);
export const ENTER_KEYS: ReadonlySet<string> = new Set(['ENTER', 'KP_ENTER']);
export const BACKSPACE_KEYS: ReadonlySet<string> = new Set(['BACKSPACE']);

// ============================================================================
// Layout
// ============================================================================

/** Column every row is drawn from */
export const LEFT_COLUMN = 1;

/** Prompt written at the start of the query row */
export const QUERY_PROMPT = '? ';
