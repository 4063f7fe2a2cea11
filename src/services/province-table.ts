import fs from "fs";
import csv from "csv-parser";
import { logger } from "./logger";

export type DivisionKind =
  | "province"
  | "municipality"
  | "autonomous_region"
  | "special_administrative_region";

/**
 * One provincial-level administrative division
 */
export interface ProvinceEntry {
  shortName: string;
  fullName: string;
  kind: DivisionKind;
}

const DIVISION_KINDS: readonly DivisionKind[] = [
  "province",
  "municipality",
  "autonomous_region",
  "special_administrative_region",
];

// Longest first so "特别行政区" is stripped before "区"
const DIVISION_SUFFIXES = ["特别行政区", "自治区", "省", "市"];

function isDivisionKind(value: string): value is DivisionKind {
  return DIVISION_KINDS.some((kind) => kind === value);
}

/**
 * Lookup table of the 34 provincial-level divisions, used to turn truncated
 * names ("广西", "北京") into their official form.
 */
export class ProvinceTable {
  private readonly entries: readonly ProvinceEntry[];
  private readonly byName = new Map<string, ProvinceEntry>();

  constructor(entries: ProvinceEntry[]) {
    this.entries = Object.freeze([...entries]);
    for (const entry of this.entries) {
      this.byName.set(entry.fullName, entry);
      this.byName.set(entry.shortName, entry);
    }
  }

  /**
   * Read the table from a CSV file with the columns
   * short_name,full_name,kind
   */
  static async load(filePath: string): Promise<ProvinceTable> {
    const entries = await new Promise<ProvinceEntry[]>((resolve, reject) => {
      const rows: ProvinceEntry[] = [];

      fs.createReadStream(filePath)
        .on("error", reject)
        .pipe(csv())
        .on("data", (row: Record<string, string>) => {
          const shortName = (row.short_name || "").trim();
          const fullName = (row.full_name || "").trim();
          const kind = (row.kind || "").trim();

          if (!shortName || !fullName || !isDivisionKind(kind)) {
            logger.warn(`Skipping malformed province row: ${JSON.stringify(row)}`);
            return;
          }

          rows.push({
            shortName,
            fullName,
            kind,
          });
        })
        .on("end", () => resolve(rows))
        .on("error", reject);
    });

    if (entries.length === 0) {
      throw new Error(`Province table ${filePath} has no usable rows`);
    }

    logger.info(`Loaded ${entries.length} provinces from ${filePath}`);
    return new ProvinceTable(entries);
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Find the division a (possibly truncated or mis-suffixed) name refers to
   */
  lookup(name: string): ProvinceEntry | undefined {
    const trimmed = name.trim();
    if (!trimmed) return undefined;

    const exact = this.byName.get(trimmed);
    if (exact) return exact;

    for (const suffix of DIVISION_SUFFIXES) {
      if (trimmed.length > suffix.length && trimmed.endsWith(suffix)) {
        const stripped = this.byName.get(trimmed.slice(0, -suffix.length));
        if (stripped) return stripped;
      }
    }

    // Partial names such as "内蒙" or "新疆维吾尔"
    if (trimmed.length >= 2) {
      const matches = this.entries.filter((entry) =>
        entry.fullName.startsWith(trimmed)
      );
      if (matches.length === 1) return matches[0];
    }

    return undefined;
  }

  /**
   * Complete a province name. Unknown names (e.g. foreign regions) are
   * returned trimmed but otherwise untouched.
   */
  complete(name: string): string {
    return this.lookup(name)?.fullName ?? name.trim();
  }

  /**
   * Municipalities are their own city; "北京" as a city becomes "北京市".
   * Ordinary cities are returned unchanged.
   */
  completeCity(city: string): string {
    const trimmed = city.trim();
    const entry = this.byName.get(trimmed) ?? this.byName.get(trimmed.replace(/市$/, ""));
    return entry && entry.kind === "municipality" ? entry.fullName : trimmed;
  }

  /**
   * Split a free-form location such as "广东省惠州市" or "广西桂林市" into
   * the division it starts with and the remaining text.
   */
  matchPrefix(text: string): { entry: ProvinceEntry; rest: string } | null {
    let best: { entry: ProvinceEntry; length: number } | null = null;

    for (const entry of this.entries) {
      for (const candidate of [entry.fullName, entry.shortName]) {
        if (text.startsWith(candidate) && (!best || candidate.length > best.length)) {
          best = { entry, length: candidate.length };
        }
      }
    }

    return best ? { entry: best.entry, rest: text.slice(best.length) } : null;
  }
}
