import { describe, expect, it } from "vitest";
import { AuthError } from "@/lib/errors";
import type { Credentials } from "@/lib/types";
import { MemoryCookieJar } from "@/test/memory-cookie-jar";
import { loadConfig } from "./config";
import type { Authenticator, LoginResult } from "./management-client";
import { SessionStore, metaCookieName } from "./session-store";

const config = loadConfig({ GME_MANAGEMENT_URL: "http://gme.test:8000", GME_REMEMBER_DAYS: "2" });

class StubAuthenticator implements Authenticator {
  calls = 0;

  async login(credentials: Credentials): Promise<LoginResult> {
    this.calls++;
    if (credentials.password !== "test-password") throw new AuthError("Invalid credentials");
    return { token: `token-of-${credentials.login}`, login: credentials.login };
  }
}

function storeOn(jar: MemoryCookieJar): SessionStore {
  return new SessionStore(jar, config, new StubAuthenticator());
}

describe("SessionStore", () => {
  it("keeps a remembered session across a browser restart", async () => {
    const jar = new MemoryCookieJar();
    await storeOn(jar).login({ login: "alice", password: "test-password" }, true);

    jar.restart();
    const restored = storeOn(jar).restore();

    expect(restored).toEqual({
      token: "token-of-alice",
      remembered: true,
      login: "alice",
      apiBaseUrl: "http://gme.test:8000/api/v1",
    });
    expect(jar.optionsOf("session_token")).toEqual({ httpOnly: true, sameSite: "lax", path: "/", maxAge: 172800 });
  });

  it("loses a session that was not remembered on restart", async () => {
    const jar = new MemoryCookieJar();
    const store = storeOn(jar);
    await store.login({ login: "alice", password: "test-password" }, false);
    expect(storeOn(jar).restore()?.login).toBe("alice");

    jar.restart();

    expect(storeOn(jar).restore()).toBeNull();
    expect(jar.names()).toEqual([]);
  });

  it("drops the previous session before signing in again", async () => {
    const jar = new MemoryCookieJar();
    const store = storeOn(jar);
    await store.login({ login: "alice", password: "test-password" }, true);

    await expect(store.login({ login: "bob", password: "wrong" }, true)).rejects.toBeInstanceOf(AuthError);

    expect(store.session).toBeNull();
    expect(jar.names()).toEqual([]);
  });

  it("clears a session recorded for another management URL", () => {
    const jar = new MemoryCookieJar();
    jar.set("session_token", "old-token", {});
    jar.set(
      metaCookieName("session_token"),
      JSON.stringify({ remembered: true, login: "alice", apiBaseUrl: "http://elsewhere/api/v1" }),
      {}
    );

    expect(storeOn(jar).restore()).toBeNull();
    expect(jar.names()).toEqual([]);
  });

  it("clears unreadable session metadata", () => {
    const jar = new MemoryCookieJar();
    jar.set("session_token", "old-token", {});
    jar.set("session_token_meta", "{not json", {});

    expect(storeOn(jar).restore()).toBeNull();
    expect(jar.names()).toEqual([]);
  });

  it("returns nothing and touches nothing without cookies", () => {
    const jar = new MemoryCookieJar();
    expect(storeOn(jar).restore()).toBeNull();
  });

  it("forgets everything on logout", async () => {
    const jar = new MemoryCookieJar();
    const store = storeOn(jar);
    await store.login({ login: "alice", password: "test-password" }, true);

    store.logout();

    expect(store.session).toBeNull();
    expect(jar.names()).toEqual([]);
  });
});
