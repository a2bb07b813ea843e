import chalk from "chalk";
import type { CatalogItem } from "../api";

const COLUMN_GAP = "  ";

function formatAddedDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Lay out items as plain-text table lines, header first
 */
export function formatItemTable(items: CatalogItem[]): string[] {
  const ids = items.map((item) => String(item.itemId));
  const idWidth = Math.max("ALBUM ID".length, ...ids.map((id) => id.length));
  const bandWidth = Math.max(
    "BAND".length,
    ...items.map((item) => item.artistName.length),
  );
  const addedWidth = "YYYY-MM-DD".length;

  const header = [
    "ALBUM ID".padStart(idWidth),
    "ADDED".padEnd(addedWidth),
    "BAND".padEnd(bandWidth),
    "ALBUM TITLE",
  ].join(COLUMN_GAP);

  const rows = items.map((item, index) =>
    [
      (ids[index] ?? "").padStart(idWidth),
      formatAddedDate(item.added),
      item.artistName.padEnd(bandWidth),
      item.itemTitle,
    ].join(COLUMN_GAP),
  );

  return [header, ...rows];
}

export function renderItemTable(items: CatalogItem[]): void {
  const [header, ...rows] = formatItemTable(items);
  if (header) {
    console.log(chalk.dim(header));
  }
  for (const row of rows) {
    console.log(row);
  }
}
