import { Request, NextFunction } from 'express';
import { MatchService } from './match.service';
import { buildUploadMatchRequest, parseMatchRequest } from '../../interfaces/dto/MatchRequestDto';
import { toMatchResponse } from '../../interfaces/dto/MatchResponseDto';
import { ValidationError } from '../../utils/errorHandler';
import { parseFile, UploadedDocument } from '../../utils/textParser';
import { logger } from '../../utils/logger';

// Narrower than express's Request/Response so handlers can be driven with stubs
type MatchRequest = Pick<Request, 'body'>;
type UploadRequest = Pick<Request, 'body'> & { file?: UploadedDocument };

interface JsonResponse {
  json(body: unknown): unknown;
}

export class MatchController {
  constructor(private readonly matchService = new MatchService()) {}

  async match(req: MatchRequest, res: JsonResponse, next: NextFunction) {
    try {
      const dto = parseMatchRequest(req.body);

      const results = await this.matchService.match(dto);

      res.json(toMatchResponse(results));
    } catch (error) {
      next(error);
    }
  }

  async matchUpload(req: UploadRequest, res: JsonResponse, next: NextFunction) {
    try {
      if (!req.file) {
        throw new ValidationError('resumeFile is required');
      }

      const resumeText = await parseFile(req.file);
      const dto = buildUploadMatchRequest(req.body, resumeText);

      const results = await this.matchService.match(dto);

      res.json(toMatchResponse(results));
    } catch (error) {
      next(error);
    }
  }

  async parse(req: UploadRequest, res: JsonResponse, next: NextFunction) {
    try {
      if (!req.file) {
        throw new ValidationError('No file uploaded');
      }

      const text = await parseFile(req.file);
      logger.info('Parsed uploaded document', { fileName: req.file.originalname, characters: text.length });

      res.json({ fileName: req.file.originalname, text });
    } catch (error) {
      next(error);
    }
  }
}
