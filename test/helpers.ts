import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import type { TLSAuthFields } from '../src/types/index.js';

const FIXTURES_DIR = join(dirname(fileURLToPath(import.meta.url)), 'fixtures');

export function readFixture(name: string): string {
  return readFileSync(join(FIXTURES_DIR, name), 'utf-8');
}

/** Self-signed P-256 pair, CN=primary.client.test */
export const PRIMARY: TLSAuthFields = {
  domains: ['example.com', '*.example.com'],
  cert: readFixture('tls/primary.cert.pem'),
  key: readFixture('tls/primary.key.pem'),
};

/** Self-signed P-256 pair, CN=secondary.client.test */
export const SECONDARY: TLSAuthFields = {
  domains: ['sub.example.com'],
  cert: readFixture('tls/secondary.cert.pem'),
  key: readFixture('tls/secondary.key.pem'),
};
