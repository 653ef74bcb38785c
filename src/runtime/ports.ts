import { createServer } from "node:net";

export const DYNAMIC_PORT_START = 49152;
export const DYNAMIC_PORT_END = 65535;

/**
 * Try an exclusive bind on all interfaces (where Docker publishes ports),
 * then release it.
 */
export function isPortFree(port: number, host = "0.0.0.0"): Promise<boolean> {
  return new Promise((resolve) => {
    const server = createServer();
    server.unref();
    server.once("error", () => resolve(false));
    server.listen({ port, host, exclusive: true }, () => {
      server.close(() => resolve(true));
    });
  });
}

/**
 * Find `count` bindable host ports in [rangeStart, rangeEnd), scanning upward.
 * Ports are only probed, not held: another process may take one before the
 * container binds it. Returns fewer than `count` if the range runs out.
 */
export async function allocatePorts(
  count: number,
  rangeStart: number = DYNAMIC_PORT_START,
  rangeEnd: number = DYNAMIC_PORT_END,
  probe: (port: number) => Promise<boolean> = isPortFree,
): Promise<number[]> {
  const ports: number[] = [];
  for (let port = rangeStart; port < rangeEnd && ports.length < count; port++) {
    if (await probe(port)) ports.push(port);
  }
  return ports;
}
