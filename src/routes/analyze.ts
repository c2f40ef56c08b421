import { Router, Request, Response, NextFunction } from 'express';
import { upload, removeUploads } from '../middleware/upload';
import { analyzeDocument } from '../services/documentAnalyzer';
import type { KeywordSummary } from '../types';

interface AnalyzeResponse {
  success: boolean;
  filename?: string;
  analysis?: KeywordSummary;
  message?: string;
}

export function createAnalyzeRouter(): Router {
  const router = Router();

  router.post('/',
    upload.single('document'),
    async (req: Request, res: Response<AnalyzeResponse>, next: NextFunction) => {
      try {
        if (!req.file) {
          return res.status(400).json({
            success: false,
            message: 'No document uploaded'
          });
        }

        const { originalname, path: filePath } = req.file;
        console.log(`File uploaded for analysis: ${originalname}`);

        try {
          const analysis = await analyzeDocument(filePath);
          return res.json({
            success: true,
            filename: originalname,
            analysis
          });
        } finally {
          await removeUploads([req.file]);
        }
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
