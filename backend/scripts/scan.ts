#!/usr/bin/env node
import { pathToFileURL } from 'node:url';
import { loadConfig } from '../core/config.js';
import { ScanError } from '../core/errors.js';
import { Fetcher } from '../core/fetcher.js';
import { createLogger } from '../core/log.js';
import { ScanOrchestrator } from '../core/orchestrator.js';
import { serializeRecord } from '../core/record.js';
import { defaultCatalogue } from '../core/registry.js';
import type { ScanConfig } from '../core/types.js';

export interface CliIO {
  env?: NodeJS.ProcessEnv;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

/** Exit codes: 0 complete, 1 failed scan, 2 bad configuration. */
export async function main(argv: string[] = process.argv.slice(2), io: CliIO = {}): Promise<number> {
  const out = io.out ?? ((line: string) => console.log(line));
  const err = io.err ?? ((line: string) => console.error(line));

  let config: ScanConfig;
  try {
    config = await loadConfig(argv, io.env);
  } catch (e) {
    if (e instanceof ScanError) {
      err(e.message);
      return 2;
    }
    throw e;
  }
  if (!config.url) {
    err('Missing --url');
    return 2;
  }

  const log = createLogger(config.logLevel);
  const orchestrator = new ScanOrchestrator({
    fetcher: new Fetcher(config.fetch, log),
    catalogue: defaultCatalogue(),
    log,
    snippetLength: config.snippetLength,
  });
  const record = await orchestrator.scan(config.url);
  out(JSON.stringify(serializeRecord(record), null, 2));
  return record.status === 'complete' ? 0 : 1;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e) => {
      console.error(e);
      process.exit(1);
    });
}
