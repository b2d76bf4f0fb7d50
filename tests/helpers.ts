import { vi } from 'vitest';
import { writeFile } from 'fs/promises';
import { join } from 'path';

export function createSinkMock() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export async function writeConfig(dir: string, yaml: string, name = 'config.yaml'): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, yaml, 'utf-8');
  return path;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
