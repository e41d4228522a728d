#!/usr/bin/env node
/*
  Normalize Vietnamese text from the command line.

  Examples:
    npm run preprocess -- --text "tôi có 15 con mèo."
    echo "Đi tp. HCM" | npm run preprocess -- --stage normalize --no-abbreviations
    npm run preprocess -- --text "ở thành phố Huế" --segment --validate
*/

import "dotenv/config";
import { runCli } from "../src/cli";

const readStdin = async (): Promise<string | undefined> => {
  if (process.stdin.isTTY) return undefined;
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
};

runCli(process.argv.slice(2), {
  stdout: (chunk) => process.stdout.write(chunk),
  stderr: (chunk) => process.stderr.write(chunk),
  readStdin,
}).catch((e) => {
  // eslint-disable-next-line no-console
  console.error(e);
  process.exit(1);
});
