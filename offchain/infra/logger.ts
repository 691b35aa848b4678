import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import pino, { type TransportMultiOptions } from 'pino';

type Target = TransportMultiOptions['targets'][number];

const level = process.env.LOG_LEVEL || 'info';
const logFile = process.env.LOG_FILE?.trim();

function buildTargets(): Target[] {
  const targets: Target[] = [];
  if (process.env.LOG_DISABLE_STDOUT !== '1') {
    targets.push({ target: 'pino/file', options: { destination: 1 }, level });
  }
  if (logFile) {
    const destination = resolve(process.cwd(), logFile);
    try {
      mkdirSync(dirname(destination), { recursive: true });
      targets.push({ target: 'pino/file', options: { destination }, level });
    } catch (err) {
      // eslint-disable-next-line no-console
      console.warn('logger-file-init-failed', err instanceof Error ? err.message : String(err));
    }
  }
  return targets;
}

// transports run in a worker thread; stdout-only logging stays in process
const transport = logFile ? pino.transport({ targets: buildTargets() }) : undefined;

export const log = transport ? pino({ level }, transport) : pino({ level });
