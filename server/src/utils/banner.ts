/**
 * Boxed ANSI banner for the server startup and the console title
 */

export interface BannerOptions {
  title: string;
  port?: number;
  backend?: string;
  model?: string;
  tts?: boolean;
  stt?: boolean;
}

export const ANSI = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
} as const;

const BOX_WIDTH = 55;
const CONTENT_WIDTH = BOX_WIDTH - 6;

/**
 * Terminal column width of a string, ignoring ANSI escapes; wide glyphs count as 2
 */
export const getVisibleWidth = (text: string): number => {
  const ansiEscape = '\x1b';
  const ansiRegex = new RegExp(`${ansiEscape}\\[[0-9;]*m`, 'g');
  const textWithoutAnsi = text.replace(ansiRegex, '');

  let width = 0;
  for (let i = 0; i < textWithoutAnsi.length; i++) {
    const codePoint = textWithoutAnsi.codePointAt(i) || 0;
    if (codePoint > 0xffff) {
      i++;
    }
    if (
      codePoint >= 0x1f000 ||
      (codePoint >= 0x1100 && codePoint <= 0x115f) ||
      (codePoint >= 0x2e80 && codePoint <= 0x4dbf) ||
      (codePoint >= 0x4e00 && codePoint <= 0x9fff) ||
      (codePoint >= 0xac00 && codePoint <= 0xd7af) ||
      (codePoint >= 0xf900 && codePoint <= 0xfaff) ||
      (codePoint >= 0xfe30 && codePoint <= 0xfe4f) ||
      (codePoint >= 0xff00 && codePoint <= 0xffef)
    ) {
      width += 2;
    } else {
      width += 1;
    }
  }
  return width;
};

const padRight = (text: string, width: number): string => {
  const visibleLength = getVisibleWidth(text);
  return text + ' '.repeat(Math.max(0, width - visibleLength));
};

const onOff = (enabled: boolean): string =>
  enabled
    ? `${ANSI.bright}${ANSI.green}enabled${ANSI.reset}`
    : `${ANSI.dim}disabled${ANSI.reset}`;

export const generateBanner = (options: BannerOptions): string[] => {
  const { reset, bright, dim, green, cyan, yellow, blue, magenta } = ANSI;

  const createLine = (content: string): string => {
    return `${bright}${green}║${reset}  ${padRight(content, CONTENT_WIDTH)}  ${bright}${green}║${reset}`;
  };

  const topBorder = `${bright}${green}╔${'═'.repeat(BOX_WIDTH - 2)}╗${reset}`;
  const divider = `${bright}${green}╠${'═'.repeat(BOX_WIDTH - 2)}╣${reset}`;
  const bottomBorder = `${bright}${green}╚${'═'.repeat(BOX_WIDTH - 2)}╝${reset}`;

  const details: string[] = [];
  if (options.port !== undefined) {
    details.push(createLine(`${dim}Status:${reset}     ${bright}${green}✓ Running${reset}`));
    details.push(createLine(`${dim}Port:${reset}       ${bright}${yellow}${options.port}${reset}`));
  }
  if (options.backend) {
    details.push(createLine(`${dim}Backend:${reset}    ${bright}${blue}${options.backend}${reset}`));
  }
  if (options.model) {
    details.push(createLine(`${dim}Model:${reset}      ${bright}${magenta}${options.model}${reset}`));
  }
  if (options.tts !== undefined) {
    details.push(createLine(`${dim}Voice out:${reset}  ${onOff(options.tts)}`));
  }
  if (options.stt !== undefined) {
    details.push(createLine(`${dim}Voice in:${reset}   ${onOff(options.stt)}`));
  }

  const lines: string[] = [];
  lines.push('');
  lines.push(topBorder);
  lines.push(createLine(`${bright}${cyan}${options.title}${reset}`));
  if (details.length > 0) {
    lines.push(divider);
    lines.push(...details);
  }
  lines.push(bottomBorder);
  lines.push('');

  return lines;
};
