"use client";

import { type ColumnDef, flexRender, getCoreRowModel, useReactTable } from "@tanstack/react-table";
import { RunStatusBadge } from "@/components/project/status-badge";
import type { RecentRun } from "@/lib/dashboard";
import { formatDateTime } from "@/lib/format";

const columns: ColumnDef<RecentRun>[] = [
  { id: "project", header: "Project", cell: ({ row }) => row.original.project.name },
  {
    id: "status",
    header: "Last run",
    cell: ({ row }) => (row.original.run ? <RunStatusBadge status={row.original.run.status} /> : "No runs"),
  },
  { id: "started", header: "Started", cell: ({ row }) => formatDateTime(row.original.run?.startedAt) },
  { id: "provider", header: "Provider", cell: ({ row }) => row.original.run?.provider ?? "-" },
  { id: "updated", header: "Project updated", cell: ({ row }) => formatDateTime(row.original.project.updatedAt) },
];

/**
 * Latest run of each project, newest first. Clicking a row opens that
 * project's run history.
 */
export default function RecentRunsTable({ rows, onOpen }: { rows: RecentRun[]; onOpen: (projectId: string) => void }) {
  const table = useReactTable({
    data: rows,
    columns,
    getCoreRowModel: getCoreRowModel(),
    getRowId: (row) => row.project.id,
  });

  return (
    <div className="border border-gray-200 rounded-md p-3 bg-white">
      <div className="mb-2 text-sm font-medium">Recent runs</div>
      <div className="overflow-auto">
        <table className="w-full text-sm" aria-label="Recent runs">
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
              <tr key={row.id} className="border-b hover:bg-gray-50 cursor-pointer" onClick={() => onOpen(row.id)}>
                {row.getVisibleCells().map((cell) => (
                  <td key={cell.id} className="px-2 py-1">
                    {flexRender(cell.column.columnDef.cell, cell.getContext())}
                  </td>
                ))}
              </tr>
            ))}
            {rows.length === 0 && (
              <tr>
                <td colSpan={columns.length} className="px-2 py-1 text-center text-sm text-gray-500">
                  No processing runs yet.
                </td>
              </tr>
            )}
          </tbody>
        </table>
      </div>
    </div>
  );
}
