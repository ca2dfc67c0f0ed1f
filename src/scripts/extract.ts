/**
 * One-off extraction from the command line
 *
 *   npm run extract -- "What is LangChain?" [--headless] [--timeout 30000]
 */

import { env } from '../config/env';
import type { ExtractionResult } from '../modules/chat/chat.types';
import { extract } from '../modules/chat/engine';

interface ExtractArgs {
  prompt: string;
  headless: boolean;
  timeoutMs: number;
}

export function parseExtractArgs(argv: readonly string[]): ExtractArgs {
  const words: string[] = [];
  let headless = false;
  let timeoutMs = env.CHAT_TIMEOUT;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--headless') {
      headless = true;
    } else if (arg === '--timeout') {
      timeoutMs = parseInt(argv[++i] ?? '', 10);
    } else {
      words.push(arg);
    }
  }

  return { prompt: words.join(' ') || 'What is LangChain?', headless, timeoutMs };
}

export async function runExtract(argv: readonly string[]): Promise<ExtractionResult> {
  const args = parseExtractArgs(argv);
  console.log(`Testing extraction with prompt: ${args.prompt}`);

  const result = await extract(args.prompt, args.headless, args.timeoutMs);

  console.log(`\nResponse text:\n${result.text}`);
  console.log(`\nMessage count: ${result.messageCount}`);
  console.log(`Metadata: ${JSON.stringify(result.metadata, null, 2)}`);
  return result;
}

async function main(): Promise<void> {
  const result = await runExtract(process.argv.slice(2));
  if (result.kind === 'failure') {
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Extraction failed:', error);
    process.exit(1);
  });
}
