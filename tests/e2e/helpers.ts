import path from "node:path";

/** Path to an e2e fixture script (e.g. fixtures/echo-server.mjs). */
export function fixturePath(...segments: string[]): string {
  return path.resolve(process.cwd(), "tests", "e2e", ...segments);
}

/** Poll /health until 200 or timeout. */
export async function waitForServer(port: number, timeoutMs: number): Promise<boolean> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    try {
      const res = await fetch(`http://127.0.0.1:${port}/health`);
      if (res.ok) return true;
    } catch {
      // not ready
    }
    await new Promise((r) => setTimeout(r, 50));
  }
  return false;
}

export const SERVE_PORT = 17777;
