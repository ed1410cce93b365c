// apps/cli/src/cli/colors.ts

export type Color = "header" | "red" | "orange" | "yellow" | "green" | "cyan" | "blue" | "violet";

// ANSI 256-color palette indices
const PALETTE: Record<Color, number> = {
  header: 10,
  red: 160,
  orange: 172,
  yellow: 184,
  green: 77,
  cyan: 43,
  blue: 33,
  violet: 99
};

const RESET = "\u001b[0m";
const BOLD = "\u001b[1m";
const UNDERLINE = "\u001b[4m";

export type PaintOptions = {
  bold?: boolean;
  underline?: boolean;
};

export type Painter = {
  enabled: boolean;
  paint(text: string, color: Color, options?: PaintOptions): string;
  header(text: string): string;
};

export function createPainter(enabled: boolean): Painter {
  function paint(text: string, color: Color, options: PaintOptions = {}): string {
    if (!enabled) return text;
    const effects = `${options.bold ? BOLD : ""}${options.underline ? UNDERLINE : ""}`;
    return `${effects}\u001b[38;5;${PALETTE[color]}m${text}${RESET}`;
  }

  return {
    enabled,
    paint,
    header: (text) => paint(text, "header", { bold: true })
  };
}

/**
 * Bands a value against a ceiling: above 83% red down to violet at 16% or less.
 */
export function rate(value: number, ceiling: number): Color {
  if (value > ceiling * 0.83) return "red";
  if (value > ceiling * 0.66) return "orange";
  if (value > ceiling * 0.5) return "yellow";
  if (value > ceiling * 0.33) return "green";
  if (value > ceiling * 0.16) return "blue";
  return "violet";
}

/**
 * Flag, then the `color` config key, then whether stdout is a terminal without NO_COLOR.
 */
export function resolveColorEnabled(options: {
  flag: boolean | undefined;
  configValue: string | undefined;
  env: NodeJS.ProcessEnv;
  isTTY: boolean;
}): boolean {
  if (options.flag !== undefined) return options.flag;
  if (options.configValue === "true") return true;
  if (options.configValue === "false") return false;
  return options.isTTY && !options.env.NO_COLOR;
}
