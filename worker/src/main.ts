#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import type { INestApplicationContext, LogLevel } from '@nestjs/common';
import { parseArgs } from 'util';
import {
  DecodeError,
  HostCapability,
  ProbeTimeline,
  type ResultBatch,
} from '@media-preflight/shared';
import { AppModule } from './app.module';
import { ProbeConfigService } from './config/probe.config';
import { ProcessHostEnvironment } from './bridge/environments/process.environment';
import { HostService } from './host/host.service';
import { ProbeService } from './probe/probe.service';
import { ReportService } from './report/report.service';
import { SandboxService } from './sandbox/sandbox.service';

const USAGE = `Usage: media-preflight <command> [options]

Commands:
  check <files...>    Probe files in a sandbox process and write the spreadsheet report
  probe <files...>    Probe files in this process and print the results
  decode <value>      Decode results from a fallback URL or its results parameter

Options:
  --embedded          check: run the sandbox in this process
  --message-only      check --embedded: offer the sandbox no host object
  --out <dir>         Directory for the spreadsheet report
  --json              Print the result batch as JSON
  --verbose           Log debug output
  -h, --help          Show this help
`;

function parseCli(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      embedded: { type: 'boolean', default: false },
      'message-only': { type: 'boolean', default: false },
      out: { type: 'string' },
      json: { type: 'boolean', default: false },
      verbose: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
}

type CliValues = ReturnType<typeof parseCli>['values'];

function logLevels(command: string, verbose: boolean): LogLevel[] {
  if (verbose) {
    return ['error', 'warn', 'log', 'debug', 'verbose'];
  }
  // Everything the sandbox prints ends up in the host's debug log
  return command === 'sandbox' ? ['error', 'warn'] : ['error', 'warn', 'log'];
}

function printBatch(app: INestApplicationContext, batch: ResultBatch, json: boolean): void {
  if (json) {
    console.log(JSON.stringify(batch, null, 2));
    return;
  }
  console.log(app.get(ReportService).renderText(batch.metadata));
  if (batch.timeline.length > 0) {
    console.log('');
    console.log(batch.timeline.join('\n'));
  }
}

async function check(app: INestApplicationContext, files: string[], values: CliValues) {
  const host = app.get(HostService);
  const capability =
    values['message-only'] === true ? HostCapability.MESSAGE_ONLY : HostCapability.DIRECT_OBJECT;
  const result =
    values.embedded === true
      ? await host.runEmbedded(files, capability)
      : await host.runForked(files);

  printBatch(app, result.batch, values.json === true);
  const filePath = await host.writeReport(result.batch, values.out);
  console.log(`Report written to ${filePath}`);
  return 0;
}

async function probe(app: INestApplicationContext, files: string[], values: CliValues) {
  const timeline = new ProbeTimeline();
  const metadata = await app.get(ProbeService).runBatch(files, { timeline });
  printBatch(app, { metadata, timeline: [...timeline.entries] }, values.json === true);
  return 0;
}

async function decode(app: INestApplicationContext, input: string, values: CliValues) {
  const host = app.get(HostService);
  const batch = host.decode(input);
  if (!batch) {
    console.error('No results found in the given value.');
    return 1;
  }

  printBatch(app, batch, values.json === true);
  if (values.out !== undefined) {
    const filePath = await host.writeReport(batch, values.out);
    console.log(`Report written to ${filePath}`);
  }
  return 0;
}

/**
 * Child side of `check`: started by the host with an IPC channel
 */
async function sandbox(app: INestApplicationContext, files: string[]) {
  const env = new ProcessHostEnvironment(app.get(ProbeConfigService).hostBaseUrl);
  const result = await app.get(SandboxService).run(files, env);
  if (process.connected) {
    process.disconnect?.();
  }
  return result.channel ? 0 : 1;
}

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseCli(argv);
  const [command, ...rest] = positionals;

  if (values.help === true || command === undefined) {
    console.log(USAGE);
    return values.help === true ? 0 : 1;
  }
  if (!['check', 'probe', 'decode', 'sandbox'].includes(command)) {
    console.error(`Unknown command: ${command}\n\n${USAGE}`);
    return 1;
  }
  if (rest.length === 0) {
    console.error(`${command} needs at least one argument\n\n${USAGE}`);
    return 1;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevels(command, values.verbose === true),
  });

  try {
    switch (command) {
      case 'check':
        return await check(app, rest, values);
      case 'probe':
        return await probe(app, rest, values);
      case 'decode':
        return await decode(app, rest.join(' '), values);
      default:
        return await sandbox(app, rest);
    }
  } catch (error) {
    if (error instanceof DecodeError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  } finally {
    await app.close();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('[media-preflight] Fatal error:', error);
    process.exit(1);
  });
