"use client";

import { type FormEvent, useState } from "react";
import { useStore } from "zustand";
import VideoPicker from "@/components/project/video-picker";
import { useServices } from "@/components/shell/services";
import { useScreenController } from "@/components/shell/use-screen-controller";
import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/input";
import { Textarea } from "@/components/ui/textarea";
import { ProjectCreateController } from "@/lib/controllers/project-create-controller";

/**
 * New project form: name, description, optional video and whether to
 * start processing right after the upload.
 */
export default function ProjectCreateScreen() {
  const { shell, controllerDeps } = useServices();
  const controller = useScreenController(
    () => new ProjectCreateController({ ...controllerDeps, navigate: (route) => shell.navigate(route) }),
    [shell, controllerDeps]
  );
  const state = useStore(controller.store);
  const formError = useStore(controller.form, (s) => s.formError);

  const [name, setName] = useState("");
  const [description, setDescription] = useState("");
  const [video, setVideo] = useState<File | null>(null);
  const [startProcessing, setStartProcessing] = useState(false);

  const busy = state.status === "loading";
  const error = formError ?? (state.status === "error" ? state.error?.message : null);

  const submit = (e: FormEvent) => {
    e.preventDefault();
    controller.submit({ name, description, video, startProcessing });
  };

  return (
    <div className="container mx-auto max-w-xl px-4 py-8">
      <h1 className="mb-6 text-2xl font-semibold">New project</h1>
      <form onSubmit={submit} className="space-y-4" noValidate>
        <label className="block text-sm">
          Project name
          <Input value={name} onChange={(e) => setName(e.target.value)} disabled={busy} />
        </label>
        <label className="block text-sm">
          Description
          <Textarea value={description} onChange={(e) => setDescription(e.target.value)} disabled={busy} />
        </label>
        <VideoPicker file={video} disabled={busy} onChange={setVideo} />
        <label className="flex items-center gap-2 text-sm">
          <input
            type="checkbox"
            checked={startProcessing}
            disabled={busy}
            onChange={(e) => setStartProcessing(e.target.checked)}
          />
          Start processing after upload
        </label>
        {error && (
          <p role="alert" className="text-sm text-red-700">
            {error}
          </p>
        )}
        <div className="flex gap-2">
          <Button type="submit" disabled={busy}>
            {busy ? (video ? "Uploading..." : "Creating...") : "Create project"}
          </Button>
          <Button variant="secondary" disabled={busy} onClick={() => controller.cancel()}>
            Cancel
          </Button>
        </div>
      </form>
    </div>
  );
}
