import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { createClient, type Client } from '@libsql/client';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const SCHEMA_PATH = path.resolve(__dirname, 'schema.sql');

// libsql does not create parent directories for local files
function ensureParentDir(url: string): void {
  if (!url.startsWith('file:')) return;
  const filePath = url.slice('file:'.length);
  if (!filePath || filePath === ':memory:') return;
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
}

export function createDbClient(url: string): Client {
  if (!url) {
    throw new Error('STORE_URL is required');
  }
  ensureParentDir(url);
  return createClient({ url });
}

export async function ensureSchema(client: Client): Promise<void> {
  const schema = fs.readFileSync(SCHEMA_PATH, 'utf-8');
  await client.executeMultiple(schema);
}
