import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import {
  CORS_ORIGINS,
  DATA_DIRS,
  KEYWORD_MAX_DEPTH,
  OUTPUT_DIR,
  PORT,
  SUMMARY_PARAGRAPHS
} from './config';
import { errorHandler } from './middleware/errorHandler';
import { createAnalyzeRouter } from './routes/analyze';
import { createProcessRouter } from './routes/process';
import { createKeywordsRouter } from './routes/keywords';
import { createSummarizer } from './services/summarizer';
import type { DataDirectories } from './engine/resolvers/types';
import type { SummarizerService } from './types/collaborators';

export interface AppOptions {
  dirs?: DataDirectories;
  summarizer?: SummarizerService | null;
  /** Skip access logging, for tests. */
  quiet?: boolean;
}

export function createApp(options: AppOptions = {}): express.Express {
  const app = express();
  const dirs = options.dirs ?? { ...DATA_DIRS, output: OUTPUT_DIR };
  const summarizer = options.summarizer === undefined ? createSummarizer() : options.summarizer;

  app.use(helmet());
  app.use(cors({
    origin: (origin, callback) => {
      if (!origin || CORS_ORIGINS.includes(origin)) {
        callback(null, true);
        return;
      }
      callback(new Error('Not allowed by CORS'));
    },
    credentials: true
  }));
  if (!options.quiet) {
    app.use(morgan('dev'));
  }
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true, limit: '10mb' }));

  app.use('/api/analyze', createAnalyzeRouter());
  app.use('/api/process', createProcessRouter({
    dirs,
    summarizer,
    segmentSummaries: SUMMARY_PARAGRAPHS,
    maxDepth: KEYWORD_MAX_DEPTH
  }));
  app.use('/api/keywords', createKeywordsRouter(dirs));

  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'healthy',
      summarizer: summarizer ? 'configured' : 'disabled',
      timestamp: new Date().toISOString()
    });
  });

  app.use(errorHandler);
  return app;
}

if (require.main === module) {
  const app = createApp();
  app.listen(PORT, () => {
    console.log(`Server running on port ${PORT}`);
    console.log('Allowed CORS origins:', CORS_ORIGINS);
    console.log(`Environment: ${process.env.NODE_ENV}`);
  });
}
