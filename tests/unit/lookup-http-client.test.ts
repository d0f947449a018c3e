import { LookupHttpClient } from "../../src/infrastructure/lookup/LookupHttpClient";
import { LookupRequestError } from "../../src/core/scan/lookup.errors";
import { readBody, startServer, type TestServer } from "../helpers/testServer";

const clientOptions = { idParam: "cinemaid", connectTimeoutMs: 1000, readTimeoutMs: 2000, randomFn: () => 0.5 };

const captureError = async (promise: Promise<unknown>): Promise<LookupRequestError> => {
  try {
    await promise;
  } catch (err) {
    if (err instanceof LookupRequestError) return err;
    throw err;
  }
  throw new Error("expected the lookup to fail");
};

describe("LookupHttpClient", () => {
  let server: TestServer | undefined;
  let client: LookupHttpClient | undefined;

  afterEach(async () => {
    await client?.close();
    await server?.close();
    client = undefined;
    server = undefined;
  });

  it("POSTs a form body with the cache-buster and identifier", async () => {
    let received: { method?: string; url?: string; contentType?: string; body: string } = { body: "" };
    server = await startServer((req, res) => {
      void readBody(req).then((body) => {
        received = { method: req.method, url: req.url, contentType: req.headers["content-type"], body };
        res.writeHead(200, { "content-type": "application/json" });
        res.end(JSON.stringify({ status: 1, data: { table0: [] } }));
      });
    });

    client = new LookupHttpClient(`${server.baseUrl}/enlib-api/lookup`, clientOptions);
    await expect(client.lookup(42)).resolves.toEqual({ status: 1, data: { table0: [] } });

    expect(received.method).toBe("POST");
    expect(received.url).toBe("/enlib-api/lookup");
    expect(received.contentType).toBe("application/x-www-form-urlencoded");
    const form = new URLSearchParams(received.body);
    expect(form.get("r")).toBe("0.5");
    expect(form.get("cinemaid")).toBe("42");
  });

  it("uses the configured identifier parameter and extra headers", async () => {
    let body = "";
    let marker: string | string[] | undefined;
    server = await startServer((req, res) => {
      marker = req.headers["x-test-marker"];
      void readBody(req).then((text) => {
        body = text;
        res.writeHead(200, { "content-type": "application/json" });
        res.end("{}");
      });
    });

    client = new LookupHttpClient(server.baseUrl, { ...clientOptions, idParam: "id", headers: { "x-test-marker": "yes" } });
    await client.lookup(7);

    expect(new URLSearchParams(body).get("id")).toBe("7");
    expect(marker).toBe("yes");
  });

  it("raises an http_status error on non-2xx without exposing the body", async () => {
    server = await startServer((_req, res) => {
      res.writeHead(503, { "content-type": "text/plain" });
      res.end("secret-upstream-body");
    });

    client = new LookupHttpClient(server.baseUrl, clientOptions);
    const err = await captureError(client.lookup(1));

    expect(err.kind).toBe("http_status");
    expect(err.status).toBe(503);
    expect(err.identifier).toBe(1);
    expect(err.message).toBe("Lookup request failed for id=1: HTTP 503");
    expect(err.retryDelayMs).toBeUndefined();
  });

  it("carries Retry-After from a 429 as milliseconds", async () => {
    server = await startServer((_req, res) => {
      res.writeHead(429, { "retry-after": "2" });
      res.end();
    });

    client = new LookupHttpClient(server.baseUrl, clientOptions);
    const err = await captureError(client.lookup(1));

    expect(err.status).toBe(429);
    expect(err.retryDelayMs).toBe(2000);
  });

  it("times out when the response headers take longer than the read timeout", async () => {
    server = await startServer((_req, res) => {
      setTimeout(() => {
        res.writeHead(200, { "content-type": "application/json" });
        res.end("{}");
      }, 500);
    });

    client = new LookupHttpClient(server.baseUrl, { ...clientOptions, readTimeoutMs: 50 });
    const err = await captureError(client.lookup(3));

    expect(err.kind).toBe("timeout");
    expect(err.message).toMatch(/^Lookup request timed out for id=3: /);
  });

  it("reports a dropped connection as a network failure", async () => {
    server = await startServer((_req, res) => {
      res.socket?.destroy();
    });

    client = new LookupHttpClient(server.baseUrl, clientOptions);
    const err = await captureError(client.lookup(4));

    expect(err.kind).toBe("network");
  });

  it("reports a refused connection as a network failure", async () => {
    const closed = await startServer(() => undefined);
    await closed.close();

    client = new LookupHttpClient(closed.baseUrl, clientOptions);
    const err = await captureError(client.lookup(5));

    expect(err.kind).toBe("network");
    expect(err.message).toMatch(/^Lookup request failed for id=5: /);
  });

  it("rejects a body that is not JSON", async () => {
    server = await startServer((_req, res) => {
      res.writeHead(200, { "content-type": "text/html" });
      res.end("<html>maintenance</html>");
    });

    client = new LookupHttpClient(server.baseUrl, clientOptions);
    const err = await captureError(client.lookup(6));

    expect(err.kind).toBe("invalid_body");
    expect(err.status).toBe(200);
    expect(err.message).toBe("Lookup response for id=6 is not valid JSON");
  });
});
