import chalk from 'chalk';

// ── Output sink ──

export interface PrintOptions {
  /** Set to false to keep the cursor on the same line */
  newline?: boolean;
}

/**
 * Line-oriented output used by the setup engine.
 * Text may carry style tags such as `[green]...[/green]`; the sink decides how to render them.
 */
export interface Output {
  print(text?: string, options?: PrintOptions): void;
}

// ── Markup ──

const STYLE_NAMES = ['red', 'green', 'yellow', 'blue', 'cyan', 'magenta', 'dim', 'bold'] as const;

type StyleName = (typeof STYLE_NAMES)[number];

const STYLE_SET: ReadonlySet<string> = new Set(STYLE_NAMES);

const TAG_PATTERN = /\[(\/?)([a-z ]*)\]/g;

function isStyleName(word: string): word is StyleName {
  return STYLE_SET.has(word);
}

function parseStyles(body: string): StyleName[] | null {
  const words = body.trim().split(/\s+/).filter(Boolean);
  if (words.length === 0) return null;
  return words.every(isStyleName) ? words : null;
}

function paint(segment: string, stack: StyleName[][], color: boolean): string {
  if (!segment || !color) return segment;
  let result = segment;
  for (const name of stack.flat()) {
    result = chalk[name](result);
  }
  return result;
}

/**
 * Render style tags with chalk. Brackets that are not known style tags
 * (`[ghstack]`, `[1/2]`) are kept verbatim.
 */
export function renderMarkup(text: string, color = true): string {
  const stack: StyleName[][] = [];
  let out = '';
  let last = 0;

  for (const match of text.matchAll(TAG_PATTERN)) {
    const [raw = '', slash = '', body = ''] = match;
    const index = match.index ?? 0;

    if (slash === '/') {
      if (stack.length === 0 || (body !== '' && parseStyles(body) === null)) continue;
      out += paint(text.slice(last, index), stack, color);
      stack.pop();
    } else {
      const styles = parseStyles(body);
      if (!styles) continue;
      out += paint(text.slice(last, index), stack, color);
      stack.push(styles);
    }
    last = index + raw.length;
  }

  return out + paint(text.slice(last), stack, color);
}

/** Remove known style tags, leaving plain text */
export function stripMarkup(text: string): string {
  return renderMarkup(text, false);
}

// ── Terminal sink ──

export interface ConsoleOptions {
  color?: boolean;
  stream?: NodeJS.WritableStream;
}

export function createConsole(options: ConsoleOptions = {}): Output {
  const color = options.color ?? chalk.level > 0;
  const stream = options.stream ?? process.stdout;

  return {
    print(text = '', printOptions = {}) {
      const end = printOptions.newline === false ? '' : '\n';
      stream.write(renderMarkup(text, color) + end);
    },
  };
}
