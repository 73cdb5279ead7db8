/**
 * Terminal formatting shared by the logger and the CLI reports.
 */

// ANSI colors & icons
export const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[90m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  red: "\x1b[31m",
  white: "\x1b[97m",
  gray: "\x1b[37m",
} as const;

export const ICONS = {
  success: "✓",
  failure: "✗",
  warning: "⚠",
  pending: "•",
};

export const CLEAR_LINE = "\r\x1b[K";

export type ColorName = keyof typeof COLORS;
const ANSI_REGEX = /\x1b\[[0-9;]*m/g;

export type Painter = {
  c: (color: ColorName, text: string) => string;
};

const colored: Painter = {
  c: (color, text) => COLORS[color] + text + COLORS.reset,
};

const plain: Painter = {
  c: (_color, text) => text,
};

export function painter(useColor: boolean): Painter {
  return useColor ? colored : plain;
}

// Time & text helpers
export function getTimestamp(date: Date = new Date()): string {
  return date.toISOString().split("T")[1].split(".")[0];
}

/** "YYYY-MM-DD HH:MM:SS" in UTC */
export function getDateTime(date: Date = new Date()): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

export function visibleLength(str: string): number {
  return str.replace(ANSI_REGEX, "").length;
}

/**
 * Wraps text to fit terminal width with proper continuation indentation.
 */
export function wrapText(
  text: string,
  firstLinePrefix: string,
  continuationIndent: string,
  termWidth: number = process.stdout.columns || 120,
): string {
  const firstLineMax = termWidth - visibleLength(firstLinePrefix);
  const continuationMax = termWidth - visibleLength(continuationIndent);

  if (text.length <= firstLineMax) {
    return text;
  }

  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";
  let isFirstLine = true;

  for (const word of words) {
    const maxWidth = isFirstLine ? firstLineMax : continuationMax;
    const testLine = currentLine ? `${currentLine} ${word}` : word;

    if (testLine.length > maxWidth && currentLine) {
      lines.push(currentLine);
      currentLine = word;
      isFirstLine = false;
    } else {
      currentLine = testLine;
    }
  }

  if (currentLine) {
    lines.push(currentLine);
  }

  return lines
    .map((line, i) => (i === 0 ? line : `\n${continuationIndent}${line}`))
    .join("");
}

/**
 * Tree-style key/value lines ("├─ Key: value", "└─ Last: value").
 */
export function indentedDetails(
  details: Record<string, string | number | boolean>,
  baseIndent: string,
  paint: Painter,
): string[] {
  const keys = Object.keys(details);
  return keys.map((key, index) => {
    const prefix = index === keys.length - 1 ? "└─" : "├─";
    const labelPrefix = `${baseIndent}${prefix} ${key}: `;
    const continuationIndent = " ".repeat(visibleLength(labelPrefix));
    const wrappedValue = wrapText(
      String(details[key]),
      labelPrefix,
      continuationIndent,
    );
    return `${baseIndent}${paint.c("gray", prefix)} ${paint.c("white", key)}: ${paint.c("gray", wrappedValue)}`;
  });
}
