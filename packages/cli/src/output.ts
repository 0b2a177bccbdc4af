/**
 * What the wirelet CLI prints: the listening banner, shutdown notices,
 * errors and `--verbose` traces. Server-side logs go through the server's
 * own logger instead.
 */

const STYLES = {
  dim: 2,
  red: 31,
  green: 32,
  yellow: 33,
  cyan: 36,
} as const;

type Style = keyof typeof STYLES;

/** ANSI colour unless `NO_COLOR` is set; `FORCE_COLOR` turns it on off a TTY. */
export function colorEnabled(env: NodeJS.ProcessEnv = process.env, isTTY = process.stdout.isTTY): boolean {
  if (env.NO_COLOR !== undefined) return false;
  if (env.FORCE_COLOR !== undefined) return true;
  return isTTY === true;
}

function paint(style: Style, text: string): string {
  return colorEnabled() ? `\x1b[${STYLES[style]}m${text}\x1b[0m` : text;
}

export interface ListeningInfo {
  address: string;
  port: number;
  mode: string;
}

/** `✔ wirelet listening on ws://host:port (mode)` on stdout. */
export function printListening({ address, port, mode }: ListeningInfo): void {
  console.log(`${paint("green", "✔")} wirelet listening on ${paint("cyan", `ws://${address}:${port}`)} (${mode})`);
}

export function printNotice(message: string): void {
  console.error(`${paint("yellow", "⚠")} ${message}`);
}

/** Error line on stderr, with an indented detail line when given. */
export function printError(message: string, detail?: string): void {
  console.error(`${paint("red", "✖")} ${message}`);
  if (detail) {
    console.error(`  ${paint("dim", detail)}`);
  }
}

export function printDebug(message: string, verbose: boolean): void {
  if (verbose) {
    console.error(paint("dim", `[debug] ${message}`));
  }
}
