import type { CourseDictionary } from "../types";

export const MIRROR_TABLE = "indice_rastreador";
const MIRROR_COLUMNS = ["curso_id", "palabra", "url", "titulo", "descripcion"] as const;
const DEFAULT_BATCH_SIZE = 500;

export interface MirrorRow {
  cursoId: string;
  palabra: string;
  url: string;
  titulo: string;
  descripcion: string;
}

/** One row per unique (course, word) pair, in dictionary order. */
export function buildMirrorRows(dictionary: CourseDictionary): MirrorRow[] {
  const rows: MirrorRow[] = [];
  for (const record of dictionary.values()) {
    for (const word of record.words) {
      rows.push({
        cursoId: record.id,
        palabra: word,
        url: record.url,
        titulo: record.title,
        descripcion: record.description,
      });
    }
  }
  return rows;
}

/** Quotes a value as a MySQL string literal. */
export function sqlString(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/'/g, "''")
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\0/g, "\\0");
  return `'${escaped}'`;
}

function renderRow(row: MirrorRow): string {
  return `(${[row.cursoId, row.palabra, row.url, row.titulo, row.descripcion].map(sqlString).join(", ")})`;
}

/** Bulk INSERT IGNORE statements, batchSize rows per statement. */
export function renderMirrorInserts(
  rows: readonly MirrorRow[],
  batchSize: number = DEFAULT_BATCH_SIZE,
): string {
  const size = Math.max(1, Math.floor(batchSize));
  const statements: string[] = [];
  for (let start = 0; start < rows.length; start += size) {
    const values = rows.slice(start, start + size).map(renderRow).join(",\n");
    statements.push(
      `INSERT IGNORE INTO ${MIRROR_TABLE} (${MIRROR_COLUMNS.join(", ")}) VALUES\n${values};\n`,
    );
  }
  return statements.join("\n");
}
