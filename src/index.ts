#!/usr/bin/env node
import 'dotenv/config';
import { resolve } from 'node:path';
import { AnnotationStore, type AnnotationFields } from './annotations.js';
import { loadSyncConfig, type SyncConfig } from './config/sync.js';
import { listCampaigns } from './locate.js';
import { runSync } from './sync.js';
import { writeJson } from './utils/fs.js';
import { log } from './utils/log.js';

process.on('uncaughtException', (error) => {
  log.error('Uncaught exception', error);
  process.exit(1);
});

type CliArgs = Record<string, string | boolean | string[]>;

const USAGE = `Usage:
  campaign-ledger sync --campaign-root <dir> [--simulator-root <dir>] [--out <file>] [--weather false]
  campaign-ledger list --pwcg-root <dir>
  campaign-ledger annotate --serial <serial> [--birth-date DD/MM/YYYY] [--birth-place <text>]
                           [--notes <text>] [--photo <ref>]
  campaign-ledger show-annotation --serial <serial>`;

function parseCliArgs(tokens: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < tokens.length; i++) {
    let token = tokens[i];
    if (token === '--') continue;
    if (!token.startsWith('--')) continue;

    token = token.slice(2);
    if (!token) continue;

    let value: string | boolean = true;
    let key = token;

    if (token.includes('=')) {
      const [k, v] = token.split(/=(.*)/s, 2);
      key = k;
      value = v ?? true;
    } else {
      const next = tokens[i + 1];
      if (next && !next.startsWith('--')) {
        value = next;
        i++;
      }
    }

    const existing = result[key];
    if (existing === undefined) {
      result[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(String(value));
    } else {
      result[key] = [String(existing), String(value)];
    }
  }

  return result;
}

function getStringArg(args: CliArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (Array.isArray(value)) return value[value.length - 1];
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return value;
}

function normalizeBoolean(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

function resolveBooleanFlag(cliValue: unknown, fallback: boolean): boolean {
  if (Array.isArray(cliValue)) {
    cliValue = cliValue[cliValue.length - 1];
  }
  if (typeof cliValue === 'boolean') return cliValue;
  if (typeof cliValue === 'string') {
    const parsed = normalizeBoolean(cliValue);
    if (parsed !== undefined) return parsed;
  }
  return fallback;
}

function optionalPathArg(args: CliArgs, key: string): string | undefined {
  const value = getStringArg(args, key);
  return value ? resolve(value) : undefined;
}

function configFromArgs(args: CliArgs): SyncConfig {
  return loadSyncConfig({
    campaignRoot: optionalPathArg(args, 'campaign-root'),
    simulatorRoot: optionalPathArg(args, 'simulator-root'),
    missionSubdir: getStringArg(args, 'mission-subdir'),
    annotationStorePath: optionalPathArg(args, 'annotations'),
    schemaDir: optionalPathArg(args, 'schema-dir'),
    weatherMatching: args.weather === undefined ? undefined : resolveBooleanFlag(args.weather, true)
  });
}

async function runSyncCommand(args: CliArgs) {
  const config = configFromArgs(args);
  const out = optionalPathArg(args, 'out');

  const result = await runSync(config, {
    onProgress: (progress) => log.debug('Sync progress', { ...progress })
  });

  for (const diagnostic of result.diagnostics) {
    log.warn(diagnostic.message, { kind: diagnostic.kind, path: diagnostic.path, key: diagnostic.key });
  }

  if (out) {
    await writeJson(out, result.model);
    log.info('Campaign model written', { out, pilots: result.model.totals.pilots });
  } else {
    process.stdout.write(`${JSON.stringify(result.model, null, 2)}\n`);
  }
}

async function runListCommand(args: CliArgs) {
  const pwcgRoot = getStringArg(args, 'pwcg-root') ?? process.env.PWCG_ROOT;
  if (!pwcgRoot) {
    throw new Error('list requires --pwcg-root or PWCG_ROOT');
  }
  const campaigns = await listCampaigns(pwcgRoot);
  process.stdout.write(campaigns.length ? `${campaigns.join('\n')}\n` : '');
  log.info('Campaigns listed', { pwcgRoot, count: campaigns.length });
}

function openStore(args: CliArgs): AnnotationStore {
  const config = configFromArgs(args);
  return new AnnotationStore(config.annotationStorePath, config.schemaDir);
}

function requireSerial(args: CliArgs): string {
  const serial = getStringArg(args, 'serial');
  if (!serial) throw new Error('--serial is required');
  return serial;
}

async function runAnnotateCommand(args: CliArgs) {
  const serial = requireSerial(args);
  const store = openStore(args);
  await store.load();

  const current = store.get(serial);
  const fields: AnnotationFields = {
    birthDate: getStringArg(args, 'birth-date') ?? current?.birthDate,
    birthPlace: getStringArg(args, 'birth-place') ?? current?.birthPlace,
    notes: getStringArg(args, 'notes') ?? current?.notes,
    photoRef: getStringArg(args, 'photo') ?? current?.photoRef
  };

  const result = await store.put(serial, fields);
  if (!result.ok) {
    throw new Error(result.error);
  }
}

async function runShowAnnotationCommand(args: CliArgs) {
  const serial = requireSerial(args);
  const store = openStore(args);
  await store.load();
  const record = store.get(serial);
  process.stdout.write(`${JSON.stringify(record ?? null, null, 2)}\n`);
}

async function main() {
  const [command, ...rest] = process.argv.slice(2);
  const args = parseCliArgs(rest);

  switch (command) {
    case 'sync':
      await runSyncCommand(args);
      break;
    case 'list':
      await runListCommand(args);
      break;
    case 'annotate':
      await runAnnotateCommand(args);
      break;
    case 'show-annotation':
      await runShowAnnotationCommand(args);
      break;
    default:
      process.stderr.write(`${USAGE}\n`);
      process.exitCode = command ? 1 : 0;
  }
}

main().catch((error) => {
  log.error('campaign-ledger failed', error);
  process.exitCode = 1;
});
