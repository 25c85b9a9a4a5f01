import { type StoreApi, createStore } from "zustand/vanilla";
import { firstIssue, registerForm, signInForm } from "@/lib/forms";
import { type ControllerDeps, ScreenController } from "@/lib/screen-controller";
import type { ClientSession } from "@/lib/types";

export type AuthMode = "sign-in" | "register";

export interface AuthFormState {
  mode: AuthMode;
  /** Problem with the input itself; nothing was sent. */
  formError: string | null;
}

export interface SignInInput {
  login: string;
  password: string;
  remember: boolean;
}

export interface RegisterInput {
  login: string;
  email: string;
  password: string;
  confirmPassword: string;
}

export interface AuthControllerDeps extends ControllerDeps {
  onSignedIn: (session: ClientSession) => void;
}

/**
 * Sign-in and registration. Both end with a session handed to the shell.
 */
export class AuthController extends ScreenController<ClientSession> {
  readonly form: StoreApi<AuthFormState>;

  constructor(private readonly authDeps: AuthControllerDeps) {
    super("login", authDeps);
    this.form = createStore<AuthFormState>(() => ({ mode: "sign-in", formError: null }));
  }

  setMode(mode: AuthMode): void {
    this.form.setState({ mode, formError: null });
  }

  signIn(input: SignInInput): void {
    const parsed = signInForm.safeParse(input);
    if (!parsed.success) {
      this.form.setState({ formError: firstIssue(parsed.error) });
      return;
    }
    this.form.setState({ formError: null });
    this.mutate(
      (api, signal) => api.login(parsed.data, signal),
      (session, requestId) => this.finish(session, requestId)
    );
  }

  register(input: RegisterInput): void {
    const parsed = registerForm.safeParse(input);
    if (!parsed.success) {
      this.form.setState({ formError: firstIssue(parsed.error) });
      return;
    }
    this.form.setState({ formError: null });
    const { login, email, password } = parsed.data;
    this.mutate(
      (api, signal) => api.register({ login, email, password }, signal),
      (session, requestId) => this.finish(session, requestId)
    );
  }

  protected override onDeactivate(): void {
    this.form.setState({ formError: null });
  }

  private finish(session: ClientSession, requestId: number): void {
    this.settle(requestId, session);
    this.authDeps.onSignedIn(session);
  }
}
