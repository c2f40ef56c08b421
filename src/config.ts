import dotenv from 'dotenv';

dotenv.config();

export const PORT = Number(process.env.PORT || 3001);

export const CORS_ORIGINS = (process.env.CORS_ORIGIN || 'http://localhost:5173')
  .split(',')
  .map(origin => origin.trim())
  .filter(origin => origin.length > 0);

export const UPLOAD_DIR = process.env.UPLOAD_DIR || './uploads';
export const OUTPUT_DIR = process.env.OUTPUT_DIR || './tmp';
export const MAX_FILE_SIZE = parseInt(process.env.MAX_FILE_SIZE || '10485760');

// Lookup directories for keyword sources
export const DATA_DIRS = {
  templates: process.env.TEMPLATES_DIR || './templates',
  json: process.env.JSON_DIR || './json',
  ai: process.env.AI_DIR || './ai',
  excel: process.env.EXCEL_DIR || './excel'
};

export const KEYWORD_MAX_DEPTH = Number(process.env.KEYWORD_MAX_DEPTH || 8);
export const SUMMARY_PARAGRAPHS = (process.env.SUMMARY_PARAGRAPHS || 'true').toLowerCase() !== 'false';
