import type { ProfileSummary } from "@modeldeck/config"

const HEADER = ["NAME", "PROVIDER", "MODEL"] as const

/**
 * Plain-text table of profiles; the default profile's row starts with `*`.
 */
export function formatProfileTable(profiles: readonly ProfileSummary[]): string {
  const rows = profiles.map((p) => ({
    marker: p.isDefault ? "*" : " ",
    cells: [p.name, p.provider, p.model],
  }))

  const widths = HEADER.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => row.cells[column]?.length ?? 0)),
  )

  const line = (marker: string, cells: readonly string[]) =>
    `${marker} ${cells.map((cell, column) => cell.padEnd(widths[column] ?? 0)).join("  ")}`.trimEnd()

  return [line(" ", HEADER), ...rows.map((row) => line(row.marker, row.cells))]
    .map((text) => `${text}\n`)
    .join("")
}
