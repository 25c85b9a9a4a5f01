"use client";

import { useRef } from "react";
import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/input";
import { VIDEO_EXTENSIONS } from "@/lib/forms";

const ACCEPT = ["video/*", ...VIDEO_EXTENSIONS.map((extension) => `.${extension}`)].join(",");

/**
 * Picks the single video attached to a new project. The file is only
 * held here; the create screen uploads it with the project.
 */
export default function VideoPicker({
  file,
  disabled,
  onChange,
}: {
  file: File | null;
  disabled?: boolean;
  onChange: (file: File | null) => void;
}) {
  const inputRef = useRef<HTMLInputElement | null>(null);

  const clear = () => {
    onChange(null);
    if (inputRef.current) inputRef.current.value = "";
  };

  return (
    <div className="space-y-2">
      <div className="text-sm font-medium">Video</div>
      <Input
        ref={inputRef}
        type="file"
        accept={ACCEPT}
        aria-label="Video file"
        className="hidden"
        onChange={(e) => onChange(e.target.files?.[0] ?? null)}
      />
      <div className="flex items-center gap-2">
        <Button variant="secondary" disabled={disabled} onClick={() => inputRef.current?.click()}>
          {file ? "Choose another video" : "Choose video"}
        </Button>
        {file && (
          <>
            <span className="truncate text-sm text-gray-700" data-testid="selected-video">
              {file.name}
            </span>
            <Button variant="ghost" size="sm" disabled={disabled} onClick={clear}>
              Remove
            </Button>
          </>
        )}
      </div>
    </div>
  );
}
