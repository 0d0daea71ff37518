import http from 'http';

export type RecordedRequest = {
  method: string;
  url: URL;
  headers: http.IncomingHttpHeaders;
  body: string;
};

export type StubResponse = {
  status: number;
  body?: unknown;
};

export type StubHandler = (request: RecordedRequest) => StubResponse;

/**
 * Local HTTP server answering with a handler, for testing API clients in process
 */
export class HttpStub {
  readonly requests: RecordedRequest[] = [];
  private server: http.Server;
  private handler: StubHandler;

  constructor(handler: StubHandler) {
    this.handler = handler;
    this.server = http.createServer((req, res) => {
      const parts: Buffer[] = [];

      req.on('data', (part: Buffer) => parts.push(part));
      req.on('end', () => {
        const recorded: RecordedRequest = {
          method: req.method ?? 'GET',
          url: new URL(req.url ?? '/', this.baseUrl),
          headers: req.headers,
          body: Buffer.concat(parts).toString('utf8')
        };
        this.requests.push(recorded);

        const { status, body } = this.handler(recorded);
        if (body === undefined) {
          res.writeHead(status);
          res.end();
          return;
        }

        res.writeHead(status, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(body));
      });
    });
  }

  get baseUrl(): string {
    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('HttpStub is not listening');
    }
    return `http://127.0.0.1:${address.port}`;
  }

  setHandler(handler: StubHandler): void {
    this.handler = handler;
  }

  async start(): Promise<void> {
    await new Promise<void>(resolve => this.server.listen(0, '127.0.0.1', resolve));
  }

  async stop(): Promise<void> {
    this.server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      this.server.close(error => (error ? reject(error) : resolve()));
    });
  }
}
