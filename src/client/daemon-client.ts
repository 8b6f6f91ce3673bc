import { createConnection } from 'net';
import { z } from 'zod';
import { CLIENT_TIMEOUT_MS } from '../constants.js';
import type { DaemonResponse } from '../types/protocol.js';

const responseSchema = z.object({
  ok: z.boolean(),
  tab_title: z.string().optional(),
  tab_color: z.string().optional(),
  stderr: z.string().optional(),
  text: z.string().optional(),
  error: z.string().optional(),
  skipped: z.string().optional(),
});

export function parseResponse(raw: string): DaemonResponse | null {
  const line = raw.split('\n', 1)[0] ?? '';
  try {
    const parsed = responseSchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * Send one request and wait for the reply. Resolves to null when the daemon
 * is not running, does not answer in time or answers garbage.
 */
export function sendToDaemon(
  socketPath: string,
  payload: Record<string, unknown>,
  timeoutMs: number = CLIENT_TIMEOUT_MS,
): Promise<DaemonResponse | null> {
  return new Promise((resolve) => {
    let received = '';
    let settled = false;
    const settle = (response: DaemonResponse | null): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      resolve(response);
    };

    const socket = createConnection(socketPath);
    const timer = setTimeout(() => settle(null), timeoutMs);

    socket.setEncoding('utf-8');
    socket.on('connect', () => {
      socket.end(`${JSON.stringify(payload)}\n`);
    });
    socket.on('data', (chunk: string) => {
      received += chunk;
      if (received.includes('\n')) settle(parseResponse(received));
    });
    socket.on('end', () => settle(parseResponse(received)));
    socket.on('error', () => settle(null));
  });
}
