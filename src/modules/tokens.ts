import { QueueError } from "../queue/errors.js";
import type { TextModule } from "./types.js";

export const TOKENS_HEADER = ["sentence", "offset", "word"] as const;

export type TokenRow = {
  sentence: number;
  offset: number;
  word: string;
};

// Words (with inner apostrophes) or single punctuation marks
const TOKEN_REGEX = /[\p{L}\p{N}]+(?:['’][\p{L}\p{N}]+)*|[^\s\p{L}\p{N}]/gu;
const SENTENCE_END = new Set([".", "!", "?"]);

export function tokenize(text: string): TokenRow[] {
  const rows: TokenRow[] = [];
  let sentence = 1;
  let ended = false;

  for (const m of text.matchAll(TOKEN_REGEX)) {
    const word = m[0];
    if (ended && !SENTENCE_END.has(word)) {
      sentence += 1;
      ended = false;
    }
    rows.push({ sentence, offset: m.index ?? 0, word });
    if (SENTENCE_END.has(word)) ended = true;
  }
  return rows;
}

export function csvField(value: string | number): string {
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

/** Parses the single-line records written by this module. */
export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let cur = "";
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const c = line[i];
    if (quoted) {
      if (c === '"' && line[i + 1] === '"') {
        cur += '"';
        i++;
      } else if (c === '"') {
        quoted = false;
      } else {
        cur += c;
      }
    } else if (c === '"') {
      quoted = true;
    } else if (c === ",") {
      fields.push(cur);
      cur = "";
    } else {
      cur += c;
    }
  }
  fields.push(cur);
  return fields;
}

function lines(result: string): string[] {
  return result.split("\n").filter((l) => l.length > 0);
}

export const tokensModule = {
  name: "tokens",

  process(text: string): string {
    const out = [TOKENS_HEADER.join(",")];
    for (const row of tokenize(text)) {
      out.push([row.sentence, row.offset, row.word].map(csvField).join(","));
    }
    return out.join("\n") + "\n";
  },

  convert(result: string, format: string, id: string): string {
    const [header, ...body] = lines(result);
    if (header === undefined) {
      throw new QueueError("InvalidArgument", "tokens: empty result");
    }

    if (format === "csv") {
      const out = [`id,${header}`, ...body.map((l) => `${csvField(id)},${l}`)];
      return out.join("\n") + "\n";
    }

    if (format === "json") {
      const rows = body.map((l) => {
        const [sentence, offset, word] = parseCsvLine(l);
        return { id, sentence: Number(sentence), offset: Number(offset), word: word ?? "" };
      });
      return JSON.stringify(rows);
    }

    throw new QueueError("InvalidArgument", `tokens: unsupported format ${format}`);
  },
} satisfies TextModule;
