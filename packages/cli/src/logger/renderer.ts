// pattern: Functional Core

import chalk, { Chalk, type ChalkInstance } from "chalk";
import { Transform } from "node:stream";

// Renderer options interface
interface RendererOptions {
  colorize?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Format an error object (message + up to 8 stack lines)
function formatErrorObject(err: unknown, paint: ChalkInstance): string {
  if (!isRecord(err)) {
    return "";
  }

  const lines: string[] = [];

  if (typeof err["message"] === "string" && err["message"]) {
    lines.push(paint.yellow(`    ${err["message"]}`));
  }

  const rawStack = err["stack"];
  const stackLines =
    typeof rawStack === "string"
      ? rawStack.split("\n").slice(1, 9)
      : Array.isArray(rawStack)
        ? rawStack.filter((line): line is string => typeof line === "string")
        : [];

  for (const line of stackLines) {
    const trimmedLine = line.trim();
    if (trimmedLine) {
      lines.push(paint.dim(paint.yellow(`        ${trimmedLine}`)));
    }
  }

  return lines.length > 0 ? `\n${lines.join("\n")}` : "";
}

function levelGlyph(
  level: unknown,
  paint: ChalkInstance
): { glyph: string; msgColor: ChalkInstance } {
  switch (level) {
    case 10: // trace
      return { glyph: paint.green("+"), msgColor: paint.reset };
    case 20: // debug
      return { glyph: paint.cyan("="), msgColor: paint.reset };
    case 30: // info
      return { glyph: paint.gray(">"), msgColor: paint.reset };
    case 40: // warn
      return { glyph: paint.yellowBright("W"), msgColor: paint.yellow };
    case 50: // error
      return { glyph: paint.inverse.red("E"), msgColor: paint.red };
    case 60: // fatal
      return { glyph: paint.inverse.redBright("E"), msgColor: paint.red };
    default:
      return { glyph: paint.gray("  LOG  "), msgColor: paint.reset };
  }
}

/**
 * Format a single pino NDJSON line as a human-readable line.
 * Lines that are not JSON objects are passed through unchanged.
 */
export function formatLogLine(line: string, paint: ChalkInstance = chalk): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return `${line}\n`;
  }
  if (!isRecord(parsed)) {
    return `${line}\n`;
  }

  const { level, msg, err, time: _time, pid: _pid, hostname: _hostname, name: _name, ...extra } =
    parsed;

  const { glyph, msgColor } = levelGlyph(level, paint);
  const formattedMsg = msgColor(typeof msg === "string" ? msg : "");
  const errorStr = err ? formatErrorObject(err, paint) : "";
  const extraStr =
    Object.keys(extra).length > 0 ? ` ${paint.dim(JSON.stringify(extra))}` : "";

  return `${glyph} ${formattedMsg}${extraStr}${errorStr}\n`;
}

// Create a pretty renderer stream like pino-pretty
export default function createRenderer(options: RendererOptions = {}): Transform {
  const paint = new Chalk({ level: options.colorize === false ? 0 : chalk.level });

  return new Transform({
    objectMode: false, // Pino sends newline-delimited JSON strings, not objects
    transform(chunk: Buffer | string, _encoding, callback): void {
      const formattedLines = chunk
        .toString()
        .split("\n")
        .filter(line => line.trim())
        .map(line => formatLogLine(line, paint));

      callback(null, formattedLines.join(""));
    },
  });
}
