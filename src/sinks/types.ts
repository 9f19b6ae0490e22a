export type CellValue = string | number | null | undefined;

export type TabularRow<H extends string = string> = { readonly [P in H]: CellValue };

export type ExportResult = { ok: true; path: string } | { ok: false; path: string; error: unknown };

export interface TableExporter {
  readonly extension: string;
  write<H extends string>(
    filePath: string,
    rows: readonly TabularRow<H>[],
    headers: readonly H[]
  ): Promise<ExportResult>;
}
