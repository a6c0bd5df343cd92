import { readdir, readFile } from "fs/promises";
import { join } from "path";
import { parse } from "csv-parse/sync";

export type LocalCsvFile = { name: string; path: string; body: Buffer; rows: number };

/** `.csv` file names directly inside `dir`, sorted. Sub-directories are not walked. */
export async function listCsvFiles(dir: string): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
        .filter(e => e.isFile() && e.name.toLowerCase().endsWith(".csv"))
        .map(e => e.name)
        .sort();
}

/** Number of data rows below the header; throws on malformed CSV. */
export function countCsvRows(buf: Buffer): number {
    const rows: unknown[] = parse(buf, { columns: true, skip_empty_lines: true, trim: true });
    return rows.length;
}

export async function readCsvFile(dir: string, name: string): Promise<LocalCsvFile> {
    const path = join(dir, name);
    const body = await readFile(path);
    return { name, path, body, rows: countCsvRows(body) };
}
