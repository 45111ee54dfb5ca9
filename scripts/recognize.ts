#!/usr/bin/env node
/**
 * Annotate a piece of text and print the expressions found.
 *
 * Text is split into words and punctuation marks; no contraction splitting
 * or sentence segmentation is done.
 *
 * Usage:
 *   tsx scripts/recognize.ts --dictionary data/portuguese/mwe_database.json \
 *     --overrides data/portuguese/lemma_dict.json "Tomei cafés da manhã."
 */

import {
  LogLevel,
  MweRecognizer,
  createConsoleLogger,
  extractAnnotations,
  type Token,
} from "../src/index.js";

interface Args {
  dictionary: string;
  overrides?: string;
  language: string;
  maxLength?: number;
  text: string;
}

function parseArgs(): Args {
  const args = process.argv.slice(2);
  const out: Args = {
    dictionary: "data/portuguese/mwe_database.json",
    language: "portuguese",
    text: "",
  };
  const words: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--dictionary") out.dictionary = args[++i];
    else if (arg === "--overrides") out.overrides = args[++i];
    else if (arg === "--language") out.language = args[++i];
    else if (arg === "--max-length") out.maxLength = parseInt(args[++i], 10);
    else words.push(arg);
  }

  out.text = words.join(" ");
  if (!out.text) {
    throw new Error("Missing text to analyze");
  }
  if (out.maxLength !== undefined && !(out.maxLength > 0)) {
    throw new Error("--max-length must be a positive integer");
  }

  return out;
}

function tokenize(text: string): Token[] {
  const pieces = text.match(/[\p{L}\p{N}]+(?:[-'’][\p{L}\p{N}]+)*|[^\s\p{L}\p{N}]/gu);
  return (pieces ?? []).map((piece) => ({ text: piece }));
}

function main(): void {
  const args = parseArgs();
  const recognizer = new MweRecognizer(args.language, {
    dictionary: { kind: "file", path: args.dictionary },
    overrides: args.overrides ? { kind: "file", path: args.overrides } : undefined,
    maxLength: args.maxLength,
    logger: createConsoleLogger({ level: LogLevel.WARN }),
  });

  const tokens = recognizer.recognize(tokenize(args.text));
  const mwes = extractAnnotations(tokens);

  console.log(
    JSON.stringify(
      {
        text: args.text,
        language: recognizer.language,
        mweCount: mwes.length,
        mwes,
      },
      null,
      2
    )
  );
}

main();
