export const DEFAULT_FILE_NAMES = {
  spreadsheet: 'impact_results.xlsx',
  summary: 'impact_summary.pdf',
  advisory: 'change_plan.pdf',
} as const;

export type ExportKind = keyof typeof DEFAULT_FILE_NAMES;

export function exportFileName(kind: ExportKind, projectName: string): string {
  const base = DEFAULT_FILE_NAMES[kind];
  const safeName = projectName
    .trim()
    .replace(/[\/\\:*?"<>|]/g, '_')
    .replace(/\s+/g, '_');
  return safeName ? `${safeName}_${base}` : base;
}
