import http from "http";
import type { AddressInfo } from "net";

export type TestServer = {
  baseUrl: string;
  port: number;
  close: () => Promise<void>;
};

export const listen = async (server: http.Server): Promise<TestServer> => {
  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", () => resolve());
  });

  const address = server.address() as AddressInfo;
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    port: address.port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
};

export const startServer = (
  handler: (req: http.IncomingMessage, res: http.ServerResponse) => void
): Promise<TestServer> => listen(http.createServer(handler));

export const readBody = (req: http.IncomingMessage): Promise<string> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
