export type HttpResponseInit = {
  status?: number;
  statusText?: string;
  headers?: Record<string, string>;
};

export class HttpResponse {
  readonly status: number;
  readonly statusText: string;
  readonly body: string;
  private readonly headersObj: Record<string, string>;

  constructor(body: string, init?: HttpResponseInit) {
    this.status = init?.status ?? 200;
    this.statusText = init?.statusText ?? 'OK';
    this.body = body;
    this.headersObj = { ...(init?.headers ?? {}) };
  }

  static json(data: unknown, init?: HttpResponseInit): HttpResponse {
    return new HttpResponse(JSON.stringify(data), withDefaultType(init, 'application/json; charset=utf-8'));
  }

  static text(body: string, init?: HttpResponseInit): HttpResponse {
    return new HttpResponse(body, withDefaultType(init, 'text/plain; charset=utf-8'));
  }

  static empty(status: number, statusText?: string): HttpResponse {
    return new HttpResponse('', { status, statusText });
  }

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  headers = {
    get: (name: string): string | null => {
      const key = Object.keys(this.headersObj).find(
        (k) => k.toLowerCase() === name.toLowerCase()
      );
      return key ? this.headersObj[key] : null;
    },
    entries: (): [string, string][] => Object.entries(this.headersObj),
  };
}

function withDefaultType(init: HttpResponseInit | undefined, contentType: string): HttpResponseInit {
  const headers = { ...(init?.headers ?? {}) };
  if (!Object.keys(headers).some((k) => k.toLowerCase() === 'content-type')) {
    headers['Content-Type'] = contentType;
  }
  return { ...init, headers };
}
