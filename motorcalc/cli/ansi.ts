export const RESET = "\x1b[0m";
export const RED = "\x1b[31m";
export const BOLD_CYAN = "\x1b[1;36m";
export const BOLD_YELLOW = "\x1b[1;33m";
export const CYAN = "\x1b[36m";
export const YELLOW = "\x1b[33m";

export const SAVE_CURSOR = "\x1b[s";
export const RESTORE_CURSOR = "\x1b[u";

// Moves up `lines` rows and clears everything below the cursor.
export const eraseLinesAbove = (lines: number) => (lines > 0 ? `\x1b[${lines}A\x1b[J` : "");
