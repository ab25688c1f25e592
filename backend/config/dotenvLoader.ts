import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';

function tryLoad(filePath: string) {
  if (!filePath || !fs.existsSync(filePath)) return;
  dotenv.config({ path: filePath, override: false });
}

/**
 * Loads backend/.env(.local), then the repo-root equivalents. Real environment
 * variables always win; DOTENV_CONFIG_PATH replaces the search entirely.
 */
export function loadDotenv() {
  const explicit = process.env.DOTENV_CONFIG_PATH;
  if (explicit) {
    tryLoad(explicit);
    return;
  }

  // From dist/backend/config the backend root is three levels up, from backend/config one.
  const thisDir = path.dirname(fileURLToPath(import.meta.url));
  const parentDir = path.resolve(thisDir, '..');
  const compiled = path.basename(path.resolve(parentDir, '..')) === 'dist';
  const backendDir = compiled ? path.resolve(parentDir, '..', '..', 'backend') : parentDir;
  const repoRoot = path.resolve(backendDir, '..');

  tryLoad(path.join(backendDir, '.env'));
  tryLoad(path.join(backendDir, '.env.local'));
  tryLoad(path.join(repoRoot, '.env'));
  tryLoad(path.join(repoRoot, '.env.local'));
}
