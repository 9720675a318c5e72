import { Router } from 'express';
import impactRouter from '../modules/impact/routes';

const router = Router();

router.use('/impact', impactRouter);

export default router;
