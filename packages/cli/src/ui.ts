// ============================================================================
// @freqtable/cli — Terminal Formatting
// ============================================================================

export interface UiOptions {
  color: boolean;
  unicode: boolean;
}

export interface Ui {
  heading(text: string): string;
  dim(text: string): string;
  number(text: string): string;
  fail(text: string): string;
  line: string;
  drawBox(title: string, width: number, lines: string[]): string;
}

const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  brightCyan: '\x1b[96m',
  brightWhite: '\x1b[97m',
};

const UNICODE_BOX = { h: '─', v: '│', tl: '┌', tr: '┐', bl: '└', br: '┘', line: '─' };
const ASCII_BOX = { h: '-', v: '|', tl: '+', tr: '+', bl: '+', br: '+', line: '-' };

/** Strip ANSI escape codes for accurate width calculation */
export function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Decide colour and box characters from argv flags and the environment.
 */
export function detectUiOptions(
  argv: string[],
  env: NodeJS.ProcessEnv,
  isTTY: boolean,
): UiOptions {
  let color = isTTY;
  if (env.FORCE_COLOR === '1' || argv.includes('--color')) color = true;
  if (env.NO_COLOR === '1' || argv.includes('--no-color')) color = false;

  let unicode: boolean;
  if (argv.includes('--ascii') || env.FREQTABLE_ASCII === '1') {
    unicode = false;
  } else {
    const locale = `${env.LC_ALL ?? ''} ${env.LC_CTYPE ?? ''} ${env.LANG ?? ''}`.toLowerCase();
    unicode = locale.includes('utf-8') || locale.includes('utf8');
  }

  return { color, unicode };
}

export function createUi(options: UiOptions): Ui {
  const box = options.unicode ? UNICODE_BOX : ASCII_BOX;

  function clr(color: string, text: string): string {
    if (!options.color) return text;
    return `${color}${text}${ANSI.reset}`;
  }

  const heading = (text: string) => clr(ANSI.bold + ANSI.brightWhite, text);
  const dim = (text: string) => clr(ANSI.dim, text);

  function drawBox(title: string, width: number, lines: string[]): string {
    const borderH = dim(box.h.repeat(width - 2));
    const borderV = dim(box.v);

    let result = `${dim(box.tl)}${borderH}${dim(box.tr)}\n`;
    if (title) {
      const padding = width - 4 - title.length;
      const padLeft = Math.floor(padding / 2);
      const padRight = padding - padLeft;
      result += `${borderV} ${' '.repeat(padLeft)}${heading(title)}${' '.repeat(padRight)} ${borderV}\n`;
      result += `${borderV}${borderH}${borderV}\n`;
    }

    for (const ln of lines) {
      const padding = width - 4 - stripAnsi(ln).length;
      result += `${borderV} ${ln}${' '.repeat(Math.max(0, padding))} ${borderV}\n`;
    }

    result += `${dim(box.bl)}${borderH}${dim(box.br)}`;
    return result;
  }

  return {
    heading,
    dim,
    number: (text) => clr(ANSI.brightCyan, text),
    fail: (text) => clr(ANSI.red, text),
    line: box.line.repeat(60),
    drawBox,
  };
}
