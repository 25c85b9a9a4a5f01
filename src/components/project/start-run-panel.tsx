"use client";

import { useState } from "react";
import { Button } from "@/components/ui/button";
import { type RunRequest, providersFor, usesAudio, usesVideo } from "@/lib/controllers/run-history-controller";
import type { ProcessingMode, ProcessingOptions } from "@/lib/types";

const MODES: { value: ProcessingMode; label: string }[] = [
  { value: "video_only", label: "Video only" },
  { value: "audio_only", label: "Audio only" },
  { value: "audio_and_video", label: "Audio and video" },
];

function isProcessingMode(value: string): value is ProcessingMode {
  return MODES.some((mode) => mode.value === value);
}

/** The chosen entry while it is still offered, else the first offered one. */
function pick(choice: string, offered: string[]): string {
  return offered.includes(choice) ? choice : (offered[0] ?? "");
}

const selectClass = "w-full rounded-md border border-gray-300 p-2 text-sm disabled:bg-gray-100";

/**
 * Options for a new processing run. Model and detector apply to the video
 * modes, the audio provider to the audio modes.
 */
export default function StartRunPanel({
  options,
  busy,
  error,
  onStart,
}: {
  options: ProcessingOptions;
  busy: boolean;
  error: string | null;
  onStart: (request: RunRequest) => void;
}) {
  const [mode, setMode] = useState<ProcessingMode>("video_only");
  const [model, setModel] = useState("");
  const [detector, setDetector] = useState("");
  const [provider, setProvider] = useState("");

  const providers = providersFor(mode, options.audioProviders);
  const request: RunRequest = {
    processingMode: mode,
    model: pick(model, options.models),
    detector: pick(detector, options.detectors),
    audioProvider: pick(
      provider,
      providers.map((item) => item.code)
    ),
  };
  const video = usesVideo(mode);
  const audio = usesAudio(mode);

  return (
    <div className="space-y-3 border border-gray-200 rounded-md p-3 bg-white">
      <div className="text-sm font-medium">Start processing</div>
      <div className="grid gap-3 sm:grid-cols-2">
        <label className="block text-sm">
          Processing mode
          <select
            className={selectClass}
            value={mode}
            disabled={busy}
            onChange={(e) => {
              if (isProcessingMode(e.target.value)) setMode(e.target.value);
            }}
          >
            {MODES.map((item) => (
              <option key={item.value} value={item.value}>
                {item.label}
              </option>
            ))}
          </select>
        </label>
        <label className="block text-sm">
          Model
          <select
            className={selectClass}
            value={request.model}
            disabled={busy || !video}
            onChange={(e) => setModel(e.target.value)}
          >
            {options.models.length === 0 && <option value="">No models available</option>}
            {options.models.map((name) => (
              <option key={name} value={name}>
                {name}
              </option>
            ))}
          </select>
        </label>
        <label className="block text-sm">
          Face detector
          <select
            className={selectClass}
            value={request.detector}
            disabled={busy || !video}
            onChange={(e) => setDetector(e.target.value)}
          >
            {options.detectors.length === 0 && <option value="">No detectors available</option>}
            {options.detectors.map((name) => (
              <option key={name} value={name}>
                {name}
              </option>
            ))}
          </select>
        </label>
        <label className="block text-sm">
          Audio provider
          <select
            className={selectClass}
            value={request.audioProvider}
            disabled={busy || !audio || providers.length === 0}
            onChange={(e) => setProvider(e.target.value)}
          >
            {providers.length === 0 && <option value="">No compatible providers</option>}
            {providers.map((item) => (
              <option key={item.code} value={item.code}>
                {item.title}
              </option>
            ))}
          </select>
        </label>
      </div>
      <Button onClick={() => onStart(request)} disabled={busy}>
        Start processing
      </Button>
      {error && (
        <p role="alert" className="text-sm text-red-700">
          {error}
        </p>
      )}
    </div>
  );
}
