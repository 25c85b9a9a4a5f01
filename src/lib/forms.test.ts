import { describe, expect, it } from "vitest";
import { firstIssue, isVideoFile, projectForm, registerForm, signInForm } from "./forms";

function issueOf(result: { success: true } | { success: false; error: Parameters<typeof firstIssue>[0] }) {
  return result.success ? null : firstIssue(result.error);
}

describe("signInForm", () => {
  it("asks for the login first", () => {
    expect(issueOf(signInForm.safeParse({ login: "  ", password: "", remember: false }))).toBe("Enter your login.");
  });
});

describe("registerForm", () => {
  it("accepts a blank e-mail and drops it", () => {
    const parsed = registerForm.safeParse({
      login: "bob",
      email: " ",
      password: "test-password",
      confirmPassword: "test-password",
    });
    expect(parsed.success && parsed.data.email).toBeUndefined();
  });

  it("rejects mismatched passwords", () => {
    const result = registerForm.safeParse({
      login: "bob",
      email: "",
      password: "test-password",
      confirmPassword: "other-password",
    });
    expect(issueOf(result)).toBe("Passwords do not match.");
  });

  it("rejects a malformed e-mail", () => {
    const result = registerForm.safeParse({
      login: "bob",
      email: "bob@",
      password: "test-password",
      confirmPassword: "test-password",
    });
    expect(issueOf(result)).toBe("Enter a valid e-mail address.");
  });
});

describe("isVideoFile", () => {
  it("trusts the MIME type, then the extension", () => {
    expect(isVideoFile({ name: "clip", type: "video/quicktime" })).toBe(true);
    expect(isVideoFile({ name: "CLIP.MKV", type: "" })).toBe(true);
    expect(isVideoFile({ name: "notes.txt", type: "text/plain" })).toBe(false);
  });
});

describe("projectForm", () => {
  it("needs a video to start processing", () => {
    const result = projectForm.safeParse({ name: "Lecture", description: "", video: null, startProcessing: true });
    expect(issueOf(result)).toBe("Attach a video to start processing right away.");
  });

  it("rejects files that are not videos", () => {
    const result = projectForm.safeParse({
      name: "Lecture",
      description: "",
      video: new File(["x"], "notes.txt", { type: "text/plain" }),
      startProcessing: false,
    });
    expect(issueOf(result)).toBe("Choose a video file (mp4, mov, avi, mkv, webm).");
  });

  it("trims the name", () => {
    const parsed = projectForm.safeParse({ name: "  Lecture ", description: "", video: null, startProcessing: false });
    expect(parsed.success && parsed.data.name).toBe("Lecture");
  });
});
