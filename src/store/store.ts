import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { ConfigFileSchema, type ConfigFileValues } from '../config.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('store');

export const SESSION_FILE = '.session';
export const LEGACY_WALLET_FILE = 'wallet.key';
const CONFIG_FILE = 'config.json';
const AUDIT_FILE = 'audit.log';

export function defaultDataDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.X402_DATA_DIR ? path.resolve(env.X402_DATA_DIR) : path.join(os.homedir(), '.x402-llm');
}

export type AuditEvent = {
  event: string;
  [key: string]: unknown;
};

/**
 * Files kept under one data directory: the wallet session key, an optional
 * `config.json` and an append-only `audit.log`.
 */
export class DataStore {
  readonly dir: string;

  constructor(dir: string = defaultDataDir()) {
    this.dir = dir;
  }

  ensureDir() {
    if (!fs.existsSync(this.dir)) fs.mkdirSync(this.dir, { recursive: true, mode: 0o700 });
  }

  /** Writes the key to `.session`, readable by the owner only. */
  saveWallet(privateKey: string): string {
    this.ensureDir();
    const file = path.join(this.dir, SESSION_FILE);
    fs.writeFileSync(file, privateKey + '\n', { mode: 0o600 });
    // mode is ignored when the file already exists
    fs.chmodSync(file, 0o600);
    return file;
  }

  /** Returns the first non-empty key among `.session` and the legacy `wallet.key`. */
  loadWallet(): { key: string; file: string } | null {
    for (const name of [SESSION_FILE, LEGACY_WALLET_FILE]) {
      const file = path.join(this.dir, name);
      if (!fs.existsSync(file)) continue;
      const key = fs.readFileSync(file, 'utf-8').trim();
      if (key) return { key, file };
    }
    return null;
  }

  readConfigFile(): ConfigFileValues {
    const file = path.join(this.dir, CONFIG_FILE);
    if (!fs.existsSync(file)) return {};
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (e) {
      log.warn('failed to parse config file, ignoring it', { file, error: String(e) });
      return {};
    }
    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn('config file has invalid values, ignoring it', { file, issue: parsed.error.issues[0]?.message });
      return {};
    }
    return parsed.data;
  }

  /** Appends one JSON line to `audit.log`. Callers must not pass key material. */
  recordAudit(event: AuditEvent) {
    this.ensureDir();
    const line = JSON.stringify({ ts: Date.now(), ...event }) + '\n';
    fs.appendFileSync(path.join(this.dir, AUDIT_FILE), line);
  }

  readAudit(): AuditEvent[] {
    const file = path.join(this.dir, AUDIT_FILE);
    if (!fs.existsSync(file)) return [];
    const events: AuditEvent[] = [];
    for (const line of fs.readFileSync(file, 'utf-8').split('\n')) {
      if (!line.trim()) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        log.warn('skipping unparsable audit line', { file });
        continue;
      }
      if (parsed && typeof parsed === 'object' && 'event' in parsed && typeof parsed.event === 'string') {
        events.push({ ...parsed, event: parsed.event });
      }
    }
    return events;
  }
}
