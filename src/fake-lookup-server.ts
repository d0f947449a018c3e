import http from "http";

/**
 * Minimal fake lookup endpoint for local end-to-end runs.
 * - POST /lookup with form fields `r` and `cinemaid`
 * - ids up to `total` resolve to a deterministic record, except every `gapEvery`-th id
 * - every `failEvery`-th request answers 503
 */
export type FakeLookupOptions = {
  total: number;
  gapEvery?: number;
  failEvery?: number;
  idParam?: string;
};

export const makeFakeRecord = (id: number) => ({
  CinemaID: id,
  CinemaName: `Cinema ${id}`,
  ZZID: String(44010000 + id),
  ProvinceName: "Guangdong",
  CityName: "Guangzhou"
});

const readBody = (req: http.IncomingMessage): Promise<string> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });

export const createFakeLookupServer = (options: FakeLookupOptions) => {
  const idParam = options.idParam ?? "cinemaid";
  let requests = 0;

  const server = http.createServer((req, res) => {
    if (req.method !== "POST" || req.url !== "/lookup") {
      res.writeHead(404);
      res.end();
      return;
    }

    requests += 1;
    if (options.failEvery && requests % options.failEvery === 0) {
      res.writeHead(503, { "content-type": "text/plain" });
      res.end("unavailable");
      return;
    }

    readBody(req).then((body) => {
      const id = Number(new URLSearchParams(body).get(idParam));
      const exists =
        Number.isInteger(id) && id >= 1 && id <= options.total && !(options.gapEvery && id % options.gapEvery === 0);

      res.writeHead(200, { "content-type": "application/json" });
      res.end(JSON.stringify({ status: 1, data: { table0: exists ? [makeFakeRecord(id)] : [] } }));
    }, () => {
      res.writeHead(400);
      res.end();
    });
  });

  return { server, requestCount: () => requests };
};

if (require.main === module) {
  const port = Number(process.env.FAKE_LOOKUP_PORT ?? 3999);
  const { server } = createFakeLookupServer({
    total: Number(process.env.FAKE_LOOKUP_TOTAL ?? 500),
    gapEvery: Number(process.env.FAKE_LOOKUP_GAP_EVERY ?? 7),
    failEvery: Number(process.env.FAKE_LOOKUP_FAIL_EVERY ?? 0)
  });

  server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake lookup server on http://localhost:${port}/lookup`);
  });
}
