"use client";

import { type FormEvent, useState } from "react";
import { useStore } from "zustand";
import { useScreenController } from "@/components/shell/use-screen-controller";
import { useServices } from "@/components/shell/services";
import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/input";
import { Tabs, TabsContent, TabsList, TabsTrigger } from "@/components/ui/tabs";
import { AuthController, type AuthMode } from "@/lib/controllers/auth-controller";

function isAuthMode(value: string): value is AuthMode {
  return value === "sign-in" || value === "register";
}

/**
 * Sign-in and registration, as two tabs. A notice from the shell (signed
 * out, session expired) is shown above them.
 */
export default function AuthScreen() {
  const { shell, controllerDeps } = useServices();
  const controller = useScreenController(
    () => new AuthController({ ...controllerDeps, onSignedIn: (session) => shell.signedIn(session) }),
    [shell, controllerDeps]
  );
  const state = useStore(controller.store);
  const { mode, formError } = useStore(controller.form);
  const notice = useStore(shell.store, (s) => s.notice);

  const [login, setLogin] = useState("");
  const [password, setPassword] = useState("");
  const [remember, setRemember] = useState(false);
  const [email, setEmail] = useState("");
  const [confirmPassword, setConfirmPassword] = useState("");

  const busy = state.status === "loading";
  const error = formError ?? (state.status === "error" ? state.error?.message : null);

  const signIn = (e: FormEvent) => {
    e.preventDefault();
    controller.signIn({ login, password, remember });
  };

  const register = (e: FormEvent) => {
    e.preventDefault();
    controller.register({ login, email, password, confirmPassword });
  };

  return (
    <div className="mx-auto mt-16 max-w-sm rounded-lg border border-gray-200 bg-white p-6 shadow-sm">
      <h1 className="mb-4 text-xl font-semibold">GME</h1>
      {notice && (
        <p role="status" className="mb-4 rounded-md bg-blue-50 p-2 text-sm text-blue-800">
          {notice}
        </p>
      )}
      <Tabs
        value={mode}
        onValueChange={(value) => {
          if (isAuthMode(value)) controller.setMode(value);
        }}
      >
        <TabsList label="Account">
          <TabsTrigger value="sign-in">Sign in</TabsTrigger>
          <TabsTrigger value="register">Register</TabsTrigger>
        </TabsList>

        <TabsContent value="sign-in">
          <form onSubmit={signIn} className="space-y-3" noValidate>
            <label className="block text-sm">
              Login
              <Input value={login} onChange={(e) => setLogin(e.target.value)} autoComplete="username" />
            </label>
            <label className="block text-sm">
              Password
              <Input
                type="password"
                value={password}
                onChange={(e) => setPassword(e.target.value)}
                autoComplete="current-password"
              />
            </label>
            <label className="flex items-center gap-2 text-sm">
              <input type="checkbox" checked={remember} onChange={(e) => setRemember(e.target.checked)} />
              Remember me
            </label>
            <Button type="submit" disabled={busy} className="w-full">
              {busy ? "Signing in..." : "Sign in"}
            </Button>
          </form>
        </TabsContent>

        <TabsContent value="register">
          <form onSubmit={register} className="space-y-3" noValidate>
            <label className="block text-sm">
              Login
              <Input value={login} onChange={(e) => setLogin(e.target.value)} autoComplete="username" />
            </label>
            <label className="block text-sm">
              E-mail (optional)
              <Input type="email" value={email} onChange={(e) => setEmail(e.target.value)} autoComplete="email" />
            </label>
            <label className="block text-sm">
              Password
              <Input
                type="password"
                value={password}
                onChange={(e) => setPassword(e.target.value)}
                autoComplete="new-password"
              />
            </label>
            <label className="block text-sm">
              Confirm password
              <Input
                type="password"
                value={confirmPassword}
                onChange={(e) => setConfirmPassword(e.target.value)}
                autoComplete="new-password"
              />
            </label>
            <Button type="submit" disabled={busy} className="w-full">
              {busy ? "Creating account..." : "Create account"}
            </Button>
          </form>
        </TabsContent>
      </Tabs>
      {error && (
        <p role="alert" className="mt-4 text-sm text-red-700">
          {error}
        </p>
      )}
    </div>
  );
}
