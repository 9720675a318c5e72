import { Workbook } from 'exceljs';
import { OA_QUESTIONNAIRE } from '../impact/catalog';
import { groupImpactTable, questionnaireSummaryTable } from '../impact/tables';
import { exportFileName } from './fileNames';
import { buildWorkbook, SHEET_NAMES } from './workbook';

async function reload(content: ArrayBuffer) {
  const workbook = new Workbook();
  await workbook.xlsx.load(content);
  return workbook;
}

describe('buildWorkbook', () => {
  it('writes one sheet per table with the header row first', async () => {
    const workbook = await reload(
      await buildWorkbook([
        {
          name: SHEET_NAMES.groupImpact,
          table: groupImpactTable([{ index: 1, name: 'Finance', employees: 40, aspectsImpacted: 2, degree: 1 }]),
        },
        {
          name: SHEET_NAMES.oaSummary,
          table: questionnaireSummaryTable(OA_QUESTIONNAIRE, { total: 30, maxScore: 60, percent: 50 }),
        },
      ])
    );

    expect(workbook.worksheets.map((sheet) => sheet.name)).toEqual(['Group Impact', 'OA Summary']);

    const groups = workbook.getWorksheet('Group Impact');
    expect(groups?.getRow(1).getCell(2).value).toBe('Group name');
    expect(groups?.getRow(1).getCell(4).value).toBe('Aspects impacted (out of 10)');
    expect(groups?.getRow(2).getCell(2).value).toBe('Finance');
    expect(groups?.getRow(2).getCell(5).value).toBe(1);

    const summary = workbook.getWorksheet('OA Summary');
    expect(summary?.getRow(2).getCell(1).value).toBe('Total OA score');
    expect(summary?.getRow(4).getCell(2).value).toBe(50);
  });

  it('keeps the header row for an empty table', async () => {
    const workbook = await reload(await buildWorkbook([{ name: SHEET_NAMES.groupImpact, table: groupImpactTable([]) }]));
    const sheet = workbook.getWorksheet('Group Impact');
    expect(sheet?.rowCount).toBe(1);
    expect(sheet?.getRow(1).getCell(1).value).toBe('#');
  });
});

describe('exportFileName', () => {
  it('prefixes the sanitized project name', () => {
    expect(exportFileName('summary', 'ERP Rollout')).toBe('ERP_Rollout_impact_summary.pdf');
    expect(exportFileName('spreadsheet', ' Q3: HR/Payroll ')).toBe('Q3__HR_Payroll_impact_results.xlsx');
    expect(exportFileName('advisory', 'a?b*c')).toBe('a_b_c_change_plan.pdf');
  });

  it('falls back to the default name without a project name', () => {
    expect(exportFileName('advisory', '   ')).toBe('change_plan.pdf');
    expect(exportFileName('spreadsheet', '')).toBe('impact_results.xlsx');
  });
});
