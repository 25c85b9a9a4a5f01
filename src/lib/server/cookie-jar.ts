import { cookies } from "next/headers";

export interface CookieOptions {
  /** Seconds; leave out for a cookie that ends with the browser session. */
  maxAge?: number;
  httpOnly?: boolean;
  sameSite?: "lax" | "strict";
  path?: string;
}

/**
 * The few cookie operations the session store needs.
 */
export interface CookieJar {
  get(name: string): string | undefined;
  set(name: string, value: string, options: CookieOptions): void;
  delete(name: string): void;
}

/**
 * Cookie jar over the cookies of the request a route handler is serving.
 * Writes end up on that handler's response.
 */
export function requestCookieJar(): CookieJar {
  const store = cookies();
  return {
    get: (name) => store.get(name)?.value,
    set: (name, value, options) => {
      store.set(name, value, options);
    },
    delete: (name) => {
      store.delete(name);
    },
  };
}
