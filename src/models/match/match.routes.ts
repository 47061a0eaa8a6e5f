import { Router } from 'express';
import multer from 'multer';
import { MatchController } from './match.controller';
import { env } from '../../config/env';

const router = Router();
const controller = new MatchController();

// Configure multer for file uploads
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: env.MAX_UPLOAD_MB * 1024 * 1024
  }
});

// POST /api/match - Rank jobs for a candidate profile
router.post('/match', controller.match.bind(controller));

// POST /api/match/upload - Rank jobs for an uploaded resume
router.post('/match/upload', upload.single('resumeFile'), controller.matchUpload.bind(controller));

// POST /api/parse - Extract plain text from an uploaded document
router.post('/parse', upload.single('file'), controller.parse.bind(controller));

export { router as matchRoutes };
