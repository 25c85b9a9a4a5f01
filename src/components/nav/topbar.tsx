"use client";

import { Button } from "@/components/ui/button";
import { Separator } from "@/components/ui/separator";
import { userDisplayName } from "@/lib/format";
import type { UserProfile } from "@/lib/types";

export const PRODUCT_NAME = "GME";

/**
 * Header of the signed-in screens: product name, a way back to the project
 * list from deeper screens, who is signed in and sign out.
 */
export default function TopBar({
  user,
  onHome,
  showBack,
  onSignOut,
}: {
  user: UserProfile;
  onHome: () => void;
  showBack: boolean;
  onSignOut: () => void;
}) {
  return (
    <div className="sticky top-0 z-40 border-b border-gray-800 bg-[#2a2a2e] backdrop-blur">
      <div className="container mx-auto px-4 h-12 flex items-center justify-between">
        <div className="flex items-center gap-3">
          <button type="button" onClick={onHome} className="font-semibold text-gray-200">
            {PRODUCT_NAME}
          </button>
          {showBack && (
            <>
              <span className="text-gray-200">/</span>
              <button type="button" onClick={onHome} className="text-sm text-blue-400 underline">
                All projects
              </button>
            </>
          )}
        </div>
        <div className="flex items-center gap-2">
          <span className="text-sm text-gray-200" data-testid="current-user">
            {userDisplayName(user)}
          </span>
          <Separator vertical />
          <Button size="sm" variant="ghost" className="text-gray-200 hover:text-gray-900" onClick={onSignOut}>
            Sign out
          </Button>
        </div>
      </div>
    </div>
  );
}
