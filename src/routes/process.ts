import { Router, Request, Response, NextFunction } from 'express';
import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { upload, removeUploads } from '../middleware/upload';
import { processDocument } from '../services/documentProcessor';
import { Workbook } from '../services/workbook';
import { WorkbookRegistry } from '../services/workbookRegistry';
import { createInputValueMap, type SummarizerService } from '../types/collaborators';
import type { DataDirectories } from '../engine/resolvers/types';
import { FormatError } from '../errors';

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

export interface ProcessRouteSettings {
  dirs: DataDirectories;
  summarizer: SummarizerService | null;
  segmentSummaries: boolean;
  maxDepth: number;
}

type UploadedFiles = Record<string, Express.Multer.File[] | undefined>;

function uploadedFiles(req: Request): UploadedFiles {
  return req.files && !Array.isArray(req.files) ? req.files : {};
}

/**
 * The `inputs` form field: a JSON object of answers keyed by keyword.
 */
export function parseInputs(raw: unknown): Record<string, string> {
  if (raw === undefined || raw === '') {
    return {};
  }
  if (typeof raw !== 'string') {
    throw new FormatError('Invalid inputs: expected a JSON object');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new FormatError('Invalid inputs: expected a JSON object');
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new FormatError('Invalid inputs: expected a JSON object');
  }

  const inputs: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      inputs[key] = String(value);
    }
  }
  return inputs;
}

export function createProcessRouter(settings: ProcessRouteSettings): Router {
  const router = Router();

  router.post('/',
    upload.fields([{ name: 'document', maxCount: 1 }, { name: 'workbook', maxCount: 1 }]),
    async (req: Request, res: Response, next: NextFunction) => {
      const files = uploadedFiles(req);
      const document = files.document?.[0];
      const workbookFile = files.workbook?.[0];

      try {
        if (!document) {
          return res.status(400).json({
            success: false,
            message: 'No document uploaded'
          });
        }

        const inputs = createInputValueMap(parseInputs(req.body?.inputs));
        const workbook = workbookFile ? await Workbook.load(workbookFile.path) : null;
        const outputPath = path.join(settings.dirs.output, `${uuidv4()}.docx`);

        console.log(`File uploaded for processing: ${document.originalname}${workbookFile ? ` with ${workbookFile.originalname}` : ''}`);

        const result = await processDocument(document.path, {
          outputPath,
          inputs,
          dirs: settings.dirs,
          workbook,
          workbooks: new WorkbookRegistry(settings.dirs.excel),
          summarizer: settings.summarizer,
          segmentSummaries: settings.segmentSummaries,
          maxDepth: settings.maxDepth
        });

        const fileBuffer = await fs.readFile(result.outputPath);
        const baseName = path.basename(document.originalname, path.extname(document.originalname));
        const sanitizedFilename = baseName.replace(/[^a-z0-9]/gi, '_');

        res.setHeader('Content-Type', DOCX_MIME);
        res.setHeader('Content-Disposition', `attachment; filename="${sanitizedFilename}_processed.docx"`);
        res.setHeader('X-Keyword-Count', String(result.totalKeywords));
        res.send(fileBuffer);

        await fs.unlink(result.outputPath).catch(console.error);
      } catch (error) {
        next(error);
      } finally {
        await removeUploads([document, workbookFile]);
      }
    }
  );

  return router;
}
