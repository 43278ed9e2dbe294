import fs from 'fs';
import path from 'path';

// An empty LOG_DIR turns file output off (console only).
const logsDir = process.env.LOG_DIR ?? path.resolve(process.cwd(), 'logs');
const appLog = path.join(logsDir, 'app.ndjson');
const errLog = path.join(logsDir, 'error.ndjson');

function ensureLogsDir() {
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }
}

function writeLine(file: string, obj: Record<string, unknown>) {
  if (!logsDir) return;
  try {
    ensureLogsDir();
    fs.appendFileSync(file, JSON.stringify({ ts: new Date().toISOString(), ...obj }) + '\n');
  } catch (e) {
    console.error(`[ERR] could not write ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export function logMsg(message: string, meta?: Record<string, unknown>) {
  const payload = { level: 'info', msg: message, ...(meta || {}) };
  console.log(`[INFO] ${message}`, meta || '');
  writeLine(appLog, payload);
}

export function logVar(name: string, value: unknown) {
  const payload: Record<string, unknown> = { level: 'debug', var: name, value };
  console.log(`[DBG] ${name}`, value);
  writeLine(appLog, payload);
}

export function logWarn(message: string, meta?: Record<string, unknown>) {
  const payload = { level: 'warn', msg: message, ...(meta || {}) };
  console.warn(`[WARN] ${message}`, meta || '');
  writeLine(appLog, payload);
}

export function logError(err: unknown, meta?: Record<string, unknown>) {
  const message = err instanceof Error ? err.message : String(err);
  const stack = err instanceof Error ? err.stack : undefined;
  const payload = { level: 'error', msg: message, stack, ...(meta || {}) };
  console.error(`[ERR] ${message}`);
  writeLine(errLog, payload);
}
