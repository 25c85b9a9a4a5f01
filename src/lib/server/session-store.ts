import { z } from "zod";
import { logInfo, logWarning } from "@/lib/logger";
import type { Credentials } from "@/lib/types";
import type { AppConfig } from "./config";
import type { CookieJar, CookieOptions } from "./cookie-jar";
import type { Authenticator } from "./management-client";

export interface Session {
  token: string;
  remembered: boolean;
  login: string;
  apiBaseUrl: string;
}

const metaSchema = z.object({
  remembered: z.boolean(),
  login: z.string(),
  apiBaseUrl: z.string(),
});

export function metaCookieName(cookieName: string): string {
  return `${cookieName}_meta`;
}

/**
 * Holds at most one session and keeps it in two cookies: the token itself
 * and a metadata record. Remembered sessions get a Max-Age and survive a
 * browser restart; the others are plain session cookies.
 */
export class SessionStore {
  private current: Session | null = null;

  constructor(
    private readonly jar: CookieJar,
    private readonly config: AppConfig,
    private readonly authenticator: Authenticator
  ) {}

  get session(): Session | null {
    return this.current;
  }

  /**
   * Sign in. Whatever session existed before is dropped first, so a failed
   * attempt leaves nobody signed in.
   */
  async login(credentials: Credentials, remember: boolean): Promise<Session> {
    this.clear();
    const result = await this.authenticator.login(credentials);
    const session: Session = {
      token: result.token,
      remembered: remember,
      login: result.login,
      apiBaseUrl: this.config.managementUrl,
    };
    this.persist(session);
    this.current = session;
    logInfo("Signed in", { login: session.login, remembered: remember });
    return session;
  }

  /**
   * Rebuild the session from the cookies. Anything unreadable, or recorded
   * against another management URL, is cleared.
   */
  restore(): Session | null {
    const token = this.jar.get(this.config.sessionCookieName);
    const rawMeta = this.jar.get(metaCookieName(this.config.sessionCookieName));
    if (!token && !rawMeta) return null;

    const meta = token && rawMeta ? parseMeta(rawMeta) : null;
    if (!token || !meta) {
      logWarning("Dropping unreadable persisted session");
      this.clear();
      return null;
    }
    if (meta.apiBaseUrl !== this.config.managementUrl) {
      logWarning("Dropping session recorded for another management URL", { apiBaseUrl: meta.apiBaseUrl });
      this.clear();
      return null;
    }

    this.current = { token, ...meta };
    return this.current;
  }

  logout(): void {
    this.clear();
  }

  private persist(session: Session): void {
    const options: CookieOptions = { httpOnly: true, sameSite: "lax", path: "/" };
    if (session.remembered) options.maxAge = this.config.rememberMaxAgeSeconds;
    this.jar.set(this.config.sessionCookieName, session.token, options);
    this.jar.set(
      metaCookieName(this.config.sessionCookieName),
      JSON.stringify({ remembered: session.remembered, login: session.login, apiBaseUrl: session.apiBaseUrl }),
      options
    );
  }

  private clear(): void {
    this.current = null;
    this.jar.delete(this.config.sessionCookieName);
    this.jar.delete(metaCookieName(this.config.sessionCookieName));
  }
}

function parseMeta(raw: string): z.infer<typeof metaSchema> | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = metaSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
