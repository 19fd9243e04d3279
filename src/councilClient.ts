import type { AddressQuery } from "./types";
import { FetchError, SessionError, errorMessage } from "./errors";
import { logger } from "./logger";

const MAX_REDIRECTS = 5;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface CouncilClientOptions {
  baseUrl: string;
  sessionPath: string;
  schedulePath: string;
  sessionCookie: string;
  address: AddressQuery;
  userAgent: string;
  requestTimeoutMs: number;
  courtesyDelayMs: number;
  fetch?: FetchLike;
  now?: () => Date;
}

/**
 * Cookies collected during one handshake + fetch exchange. Domain and path
 * attributes are ignored: `request` never leaves the configured origin.
 */
export class CookieStore {
  private readonly cookies = new Map<string, string>();

  absorb(response: Response): string[] {
    const names: string[] = [];
    for (const header of response.headers.getSetCookie()) {
      const pair = header.split(";", 1)[0] ?? "";
      const separator = pair.indexOf("=");
      if (separator <= 0) {
        continue;
      }
      const name = pair.slice(0, separator).trim();
      this.cookies.set(name, pair.slice(separator + 1).trim());
      names.push(name);
    }
    return names;
  }

  has(name: string): boolean {
    return this.cookies.has(name);
  }

  header(): string | undefined {
    if (this.cookies.size === 0) {
      return undefined;
    }
    return [...this.cookies].map(([name, value]) => `${name}=${value}`).join("; ");
  }
}

export interface Session {
  cookies: CookieStore;
}

/** Resolves after `ms`, or rejects with the signal's reason as soon as it aborts. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export class CouncilClient {
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;

  constructor(private readonly options: CouncilClientOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Performs the address handshake, pauses briefly, then downloads the
   * schedule page with the session it established.
   */
  async fetchRawSchedule(signal?: AbortSignal): Promise<string> {
    const session = await this.acquireSession(signal);
    await delay(this.options.courtesyDelayMs, signal);
    return this.fetchSchedule(session, signal);
  }

  /**
   * Seeds the server-side address selection. Success is judged by the session
   * cookie alone: it may arrive on an error response, or on an earlier hop of
   * the same exchange, and a 2xx without it is still a failure.
   */
  async acquireSession(signal?: AbortSignal): Promise<Session> {
    const { address, sessionCookie } = this.options;
    const params = new URLSearchParams({ uprn: address.uprn });
    if (address.addressLine) {
      params.set("address", address.addressLine);
    }
    if (address.postcode) {
      params.set("postcode", address.postcode);
    }
    if (address.latitude) {
      params.set("latitude", address.latitude);
    }
    if (address.longitude) {
      params.set("longitude", address.longitude);
    }
    params.set("_", String(this.now().getTime()));

    const cookies = new CookieStore();
    const url = `${this.options.baseUrl}${this.options.sessionPath}?${params.toString()}`;
    logger.debug(`Seeding address for UPRN ${address.uprn}`);

    let response: Response;
    try {
      response = await this.request(url, cookies, signal);
    } catch (error) {
      throw new SessionError(`save address: ${errorMessage(error)}`, { cause: error });
    }

    const setNow = cookies.absorb(response).includes(sessionCookie);
    await response.body?.cancel();

    if (setNow || cookies.has(sessionCookie)) {
      return { cookies };
    }

    if (response.status >= 400) {
      throw new SessionError(
        `failed to seed address cookie: status ${response.status}`,
        { status: response.status }
      );
    }
    throw new SessionError("failed to seed address cookie");
  }

  async fetchSchedule(session: Session, signal?: AbortSignal): Promise<string> {
    const url = `${this.options.baseUrl}${this.options.schedulePath}`;

    let response: Response;
    let body: string;
    try {
      response = await this.request(url, session.cookies, signal);
      body = await response.text();
    } catch (error) {
      throw new FetchError(`fetch schedule: ${errorMessage(error)}`, { cause: error });
    }

    if (response.status >= 400) {
      throw new FetchError(`fetch schedule: unexpected status ${response.status}`, {
        status: response.status,
      });
    }

    logger.debug(`Fetched schedule HTML (${body.length} chars)`);
    return body;
  }

  /**
   * GET with the client identifier, the exchange's cookies and a bounded
   * timeout. Redirects are followed by hand so every hop's cookies are kept;
   * one pointing at another origin is refused before the cookies could leak.
   */
  private async request(
    url: string,
    cookies: CookieStore,
    signal?: AbortSignal
  ): Promise<Response> {
    const timeout = AbortSignal.timeout(this.options.requestTimeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    const origin = new URL(this.options.baseUrl).origin;
    let target = url;
    for (let hop = 0; ; hop++) {
      const headers: Record<string, string> = { "User-Agent": this.options.userAgent };
      const cookieHeader = cookies.header();
      if (cookieHeader) {
        headers.Cookie = cookieHeader;
      }

      const response = await this.fetchImpl(target, {
        method: "GET",
        headers,
        redirect: "manual",
        signal: combined,
      });

      const location = response.headers.get("location");
      if (response.status < 300 || response.status >= 400 || !location) {
        return response;
      }

      cookies.absorb(response);
      await response.body?.cancel();
      if (hop + 1 >= MAX_REDIRECTS) {
        throw new Error(`too many redirects from ${url}`);
      }
      const next = new URL(location, target);
      if (next.origin !== origin) {
        throw new Error(`refused cross-origin redirect to ${next.origin}`);
      }
      target = next.toString();
    }
  }
}
