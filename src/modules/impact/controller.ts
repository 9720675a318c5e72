import { Request, Response } from 'express';
import { config } from '../../config';
import { parseBody } from '../../middleware/error.middleware';
import { safeLogger } from '../../security/safeLogger';
import { buildAdvisoryPayload, requestAdvisoryText } from '../advisory/advisory.service';
import { renderAdvisoryPdf } from '../reports/advisoryDocument';
import { exportFileName } from '../reports/fileNames';
import { renderSummaryPdf } from '../reports/summaryDocument';
import { buildWorkbook, SHEET_NAMES } from '../reports/workbook';
import { catalogView, CC_QUESTIONNAIRE, OA_QUESTIONNAIRE } from './catalog';
import { advisoryExportSchema, Submission, submissionSchema } from './schema';
import { assess } from './scoring';
import { groupImpactTable, questionDetailTable, questionnaireSummaryTable, topGroupsTable } from './tables';

function assessSubmission(submission: Submission) {
  return assess(submission, config.report.degreeDecimals);
}

function sendFile(res: Response, fileName: string, content: Buffer) {
  res.attachment(fileName);
  res.send(content);
}

export function getCatalog(_req: Request, res: Response) {
  res.json({ data: catalogView() });
}

export async function postAssessment(req: Request, res: Response) {
  const submission = parseBody(submissionSchema, req.body);
  const result = assessSubmission(submission);

  res.json({
    data: {
      cc: result.cc,
      oa: result.oa,
      highlights: { cc: result.ccHighlights, oa: result.oaHighlights },
      groups: result.groups,
      groupTable: groupImpactTable(result.groups),
      topGroups: topGroupsTable(result.groups),
      summaryTables: {
        cc: questionnaireSummaryTable(CC_QUESTIONNAIRE, result.cc),
        oa: questionnaireSummaryTable(OA_QUESTIONNAIRE, result.oa),
      },
    },
  });
}

export async function postSpreadsheetExport(req: Request, res: Response) {
  const submission = parseBody(submissionSchema, req.body);
  const result = assessSubmission(submission);

  const workbook = await buildWorkbook([
    { name: SHEET_NAMES.groupImpact, table: groupImpactTable(result.groups) },
    { name: SHEET_NAMES.oaSummary, table: questionnaireSummaryTable(OA_QUESTIONNAIRE, result.oa) },
    { name: SHEET_NAMES.oaDetails, table: questionDetailTable(OA_QUESTIONNAIRE, submission.oa) },
  ]);
  sendFile(res, exportFileName('spreadsheet', submission.project.projectName), Buffer.from(workbook));
}

export async function postSummaryExport(req: Request, res: Response) {
  const submission = parseBody(submissionSchema, req.body);
  const pdf = await renderSummaryPdf(submission.project, assessSubmission(submission));
  sendFile(res, exportFileName('summary', submission.project.projectName), Buffer.from(pdf));
}

export async function postAdvisory(req: Request, res: Response) {
  const submission = parseBody(submissionSchema, req.body);
  const result = assessSubmission(submission);
  const payload = buildAdvisoryPayload(submission.project, result.groups, { score: result.oa, answers: submission.oa });

  const outcome = await requestAdvisoryText(payload);
  if (!outcome.ok) {
    safeLogger.info('advisory.unavailable', { code: outcome.error.code });
    const status = outcome.error.code === 'MISSING_CREDENTIAL' ? 503 : 502;
    return res.status(status).json({ error: outcome.error.code, message: outcome.error.message, data: { text: null } });
  }
  return res.json({ data: { text: outcome.text } });
}

export async function postAdvisoryExport(req: Request, res: Response) {
  const request = parseBody(advisoryExportSchema, req.body);
  const pdf = await renderAdvisoryPdf(request.project, request.advisoryText);
  sendFile(res, exportFileName('advisory', request.project.projectName), Buffer.from(pdf));
}
