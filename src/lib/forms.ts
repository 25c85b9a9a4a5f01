import { z } from "zod";

/**
 * Form rules checked in the browser before anything is sent. The parsed
 * values are trimmed where the backend expects trimmed text.
 */

export const VIDEO_EXTENSIONS = ["mp4", "mov", "avi", "mkv", "webm"] as const;

export const signInForm = z.object({
  login: z.string().trim().min(1, "Enter your login."),
  password: z.string().min(1, "Enter your password."),
  remember: z.boolean(),
});

export const registerForm = z
  .object({
    login: z.string().trim().min(3, "Login must be at least 3 characters."),
    email: z
      .string()
      .trim()
      .refine((value) => value === "" || z.string().email().safeParse(value).success, "Enter a valid e-mail address.")
      .transform((value) => value || undefined),
    password: z.string().min(8, "Password must be at least 8 characters."),
    confirmPassword: z.string(),
  })
  .refine((form) => form.password === form.confirmPassword, {
    message: "Passwords do not match.",
    path: ["confirmPassword"],
  });

export interface VideoFileInfo {
  name: string;
  type: string;
}

export function isVideoFile(file: VideoFileInfo): boolean {
  if (file.type.startsWith("video/")) return true;
  const dot = file.name.lastIndexOf(".");
  if (dot < 0) return false;
  const extension = file.name.slice(dot + 1).toLowerCase();
  return VIDEO_EXTENSIONS.some((known) => known === extension);
}

export const projectForm = z
  .object({
    name: z.string().trim().min(3, "Project name must be at least 3 characters."),
    description: z.string().trim(),
    video: z.custom<File>((value) => value instanceof File).nullable(),
    startProcessing: z.boolean(),
  })
  .superRefine((form, ctx) => {
    if (form.video && !isVideoFile(form.video)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["video"],
        message: `Choose a video file (${VIDEO_EXTENSIONS.join(", ")}).`,
      });
    }
    if (form.startProcessing && !form.video) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["startProcessing"],
        message: "Attach a video to start processing right away.",
      });
    }
  });

/** First message of a failed parse. */
export function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? "Invalid input.";
}
