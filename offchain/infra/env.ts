import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import dotenvExpand from 'dotenv-expand';

// Load .env from the project root, falling back to the working directory
const ROOT = path.resolve(__dirname, '..', '..');
const CANDIDATES = [path.join(ROOT, '.env'), path.resolve(process.cwd(), '.env')];

const PRESERVE_KEYS = ['REDIS_URL', 'PROM_PORT', 'RISK_ENGINE_PORT', 'MARGIN_CONFIG'];

const preserved: Record<string, string | undefined> = {};
for (const key of PRESERVE_KEYS) {
  preserved[key] = process.env[key];
}

for (const p of CANDIDATES) {
  if (fs.existsSync(p)) {
    const result = dotenv.config({ path: p, override: true });
    dotenvExpand.expand({ parsed: result.parsed });
    break;
  }
}

for (const key of PRESERVE_KEYS) {
  const val = preserved[key];
  if (val && val.trim() !== '' && !/\$\{.*\}/.test(val)) {
    process.env[key] = val;
  }
}

function warn(name: string) {
  const value = process.env[name];
  if (!value || /\$\{.*\}/.test(value)) {
    // eslint-disable-next-line no-console
    console.warn(`[env] WARN missing or unexpanded var: ${name}`);
  }
}

['RPC_URL', 'KEEPER_PRIVATE_KEY'].forEach(warn);
