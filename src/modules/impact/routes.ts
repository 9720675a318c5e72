import { Router } from 'express';
import { asyncHandler } from '../../middleware/error.middleware';
import { preventBodyLogging } from '../../security/safeLogger';
import {
  getCatalog,
  postAdvisory,
  postAdvisoryExport,
  postAssessment,
  postSpreadsheetExport,
  postSummaryExport,
} from './controller';

const router = Router();

router.get('/questionnaires', getCatalog);
router.post('/assessments', preventBodyLogging, asyncHandler(postAssessment));
router.post('/advisory', preventBodyLogging, asyncHandler(postAdvisory));
router.post('/exports/spreadsheet', preventBodyLogging, asyncHandler(postSpreadsheetExport));
router.post('/exports/summary', preventBodyLogging, asyncHandler(postSummaryExport));
router.post('/exports/advisory', preventBodyLogging, asyncHandler(postAdvisoryExport));

export default router;
