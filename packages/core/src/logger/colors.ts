// =============================================================================
// ANSI color helpers — disabled for NO_COLOR and non-TTY output
// =============================================================================

const enabled = process.stdout?.isTTY === true && !process.env.NO_COLOR;

function wrap(open: number, close: number) {
	return enabled ? (s: string) => `\x1b[${open}m${s}\x1b[${close}m` : (s: string) => s;
}

export const bold = wrap(1, 22);
export const dim = wrap(2, 22);
export const red = wrap(31, 39);
export const yellow = wrap(33, 39);
export const blue = wrap(34, 39);
export const magenta = wrap(35, 39);
