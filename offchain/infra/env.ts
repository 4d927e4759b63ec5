import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { expand } from 'dotenv-expand';

// .env at the project root, then the working directory
const ROOT = path.resolve(__dirname, '..', '..');
const CANDIDATES = [path.join(ROOT, '.env'), path.resolve(process.cwd(), '.env')];

// values exported by the shell win over the file
const PRESERVE_KEYS = ['CONFIG_PATH', 'PROM_PORT', 'LOG_LEVEL', 'KILL_SWITCH_FILE'];

const preserved: Record<string, string | undefined> = {};
for (const key of PRESERVE_KEYS) {
  preserved[key] = process.env[key];
}

for (const p of CANDIDATES) {
  if (fs.existsSync(p)) {
    const result = dotenv.config({ path: p, override: true });
    expand({ parsed: result.parsed });
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
  if (value !== undefined && /\$\{.*\}/.test(value)) {
    console.warn(`[env] WARN unexpanded var: ${name}`);
  }
}

PRESERVE_KEYS.forEach(warn);
