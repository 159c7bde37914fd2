import { createServer } from 'net';

export const MAX_PORT_ATTEMPTS = 100;

/**
 * Check whether a TCP port can be bound on the given host
 */
export function isPortAvailable(port: number, host = '0.0.0.0'): Promise<boolean> {
  return new Promise((resolve) => {
    const candidate = createServer();

    candidate.once('error', () => {
      resolve(false);
    });
    candidate.once('listening', () => {
      candidate.close(() => resolve(true));
    });
    candidate.listen(port, host);
  });
}

/**
 * First free port in `[startPort, startPort + maxAttempts)`
 *
 * @throws Error when every port in the range is taken
 */
export async function findAvailablePort(
  startPort: number,
  maxAttempts: number = MAX_PORT_ATTEMPTS,
  host?: string
): Promise<number> {
  const lastPort = Math.min(startPort + maxAttempts, 65536);

  for (let port = startPort; port < lastPort; port++) {
    if (await isPortAvailable(port, host)) {
      return port;
    }
  }

  throw new Error(`No available ports in range ${startPort}-${startPort + maxAttempts}`);
}
