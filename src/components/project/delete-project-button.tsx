"use client";

import { useState } from "react";
import { Button } from "@/components/ui/button";
import { Dialog, DialogContent, DialogHeader, DialogTitle, DialogTrigger } from "@/components/ui/dialog";

/**
 * Delete with a confirmation step. The actual request goes through the
 * project list controller, which reloads afterwards.
 */
export default function DeleteProjectButton({
  projectName,
  disabled,
  onConfirm,
}: {
  projectName: string;
  disabled?: boolean;
  onConfirm: () => void;
}) {
  const [open, setOpen] = useState(false);

  return (
    <Dialog open={open} onOpenChange={setOpen}>
      <DialogTrigger variant="destructive" size="sm" disabled={disabled} aria-label={`Delete ${projectName}`}>
        Delete
      </DialogTrigger>
      <DialogContent className="sm:max-w-md">
        <DialogHeader>
          <DialogTitle>Delete project?</DialogTitle>
        </DialogHeader>
        <div className="space-y-3 text-sm">
          <p>
            &ldquo;{projectName}&rdquo; and its processing history will be removed. This cannot be undone.
          </p>
          <div className="flex gap-2">
            <Button variant="secondary" onClick={() => setOpen(false)}>
              Cancel
            </Button>
            <Button
              variant="destructive"
              onClick={() => {
                setOpen(false);
                onConfirm();
              }}
            >
              Confirm delete
            </Button>
          </div>
        </div>
      </DialogContent>
    </Dialog>
  );
}
