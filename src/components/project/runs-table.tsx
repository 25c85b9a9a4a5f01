"use client";

import { type ColumnDef, flexRender, getCoreRowModel, useReactTable } from "@tanstack/react-table";
import { RunStatusBadge } from "@/components/project/status-badge";
import { Button } from "@/components/ui/button";
import { formatDateTime, isRunActive } from "@/lib/format";
import type { Run } from "@/lib/types";

/**
 * Processing runs of one project. Active runs get a Cancel button.
 */
export default function RunsTable({
  runs,
  total,
  busy,
  onCancel,
}: {
  runs: Run[];
  total: number;
  busy: boolean;
  onCancel: (runId: string) => void;
}) {
  const columns: ColumnDef<Run>[] = [
    { id: "started", header: "Started", cell: ({ row }) => formatDateTime(row.original.startedAt) },
    { id: "status", header: "Status", cell: ({ row }) => <RunStatusBadge status={row.original.status} /> },
    { id: "provider", header: "Provider", cell: ({ row }) => row.original.provider ?? "-" },
    { id: "launchMode", header: "Launch", cell: ({ row }) => row.original.launchMode ?? "-" },
    { id: "summary", header: "Summary", cell: ({ row }) => row.original.resultSummary ?? "-" },
    { id: "completed", header: "Finished", cell: ({ row }) => formatDateTime(row.original.completedAt) },
    {
      id: "actions",
      header: "",
      cell: ({ row }) =>
        isRunActive(row.original.status) ? (
          <Button size="sm" variant="secondary" disabled={busy} onClick={() => onCancel(row.original.id)}>
            Cancel
          </Button>
        ) : null,
    },
  ];

  const table = useReactTable({
    data: runs,
    columns,
    getCoreRowModel: getCoreRowModel(),
    getRowId: (run) => run.id,
  });

  return (
    <div className="border border-gray-200 rounded-md p-3 bg-white">
      <div className="mb-2 text-sm font-medium">
        Processing runs {total > runs.length ? `(latest ${runs.length} of ${total})` : `(${total})`}
      </div>
      <div className="overflow-auto">
        <table className="w-full text-sm" aria-label="Processing runs">
          <thead>
            {table.getHeaderGroups().map((headerGroup) => (
              <tr key={headerGroup.id} className="border-b">
                {headerGroup.headers.map((header) => (
                  <th key={header.id} className="px-2 py-1 text-left font-semibold">
                    {header.isPlaceholder ? null : flexRender(header.column.columnDef.header, header.getContext())}
                  </th>
                ))}
              </tr>
            ))}
          </thead>
          <tbody>
            {table.getRowModel().rows.map((row) => (
              <tr key={row.id} className="border-b hover:bg-gray-50">
                {row.getVisibleCells().map((cell) => (
                  <td key={cell.id} className="px-2 py-1">
                    {flexRender(cell.column.columnDef.cell, cell.getContext())}
                  </td>
                ))}
              </tr>
            ))}
            {runs.length === 0 && (
              <tr>
                <td colSpan={columns.length} className="px-2 py-1 text-center text-sm text-gray-500">
                  This project has not been processed yet.
                </td>
              </tr>
            )}
          </tbody>
        </table>
      </div>
    </div>
  );
}
