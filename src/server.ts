/**
 * Express server setup
 */

import express, { type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import multer from 'multer';
import { z, ZodError } from 'zod';
import { loadConfig, type LithophaneConfig } from './config.js';
import {
  generateLithophaneStl,
  generatePreviewStl,
  getImageDimensions
} from './services/lithophaneService.js';
import { DegenerateGeometryError, LithophaneError } from './geometry/errors.js';
import { error as logError, info } from './utils/debug.js';

const expressionFields = {
  xExpression: z.string().min(1, 'xExpression is required'),
  yExpression: z.string().min(1, 'yExpression is required'),
  zExpression: z.string().min(1, 'zExpression is required')
};

// Blank form fields fall back to the configured default
const optionalNumberField = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.coerce.number().finite().optional()
);

/**
 * Multipart text fields of POST /lithophane (numbers arrive as strings)
 */
const lithophaneFieldsSchema = z.object({
  ...expressionFields,
  whiteDepth: optionalNumberField,
  blackDepth: optionalNumberField
});

/**
 * JSON body of POST /preview
 */
const previewBodySchema = z.object({
  ...expressionFields,
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  step: z.number().int().positive()
});

function sendStl(res: Response, stl: Buffer, filename: string): void {
  res.setHeader('Content-Type', 'model/stl');
  res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
  res.send(stl);
}

function statusFor(err: Error): number {
  if (err instanceof ZodError) return 400;
  if (err instanceof multer.MulterError) return err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
  if (err instanceof DegenerateGeometryError) return 422;
  if (err instanceof LithophaneError) return 400;
  return 500;
}

function messageFor(err: Error): string {
  if (err instanceof ZodError) {
    return err.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
  }
  return err.message;
}

export function createServer(config: LithophaneConfig = loadConfig()): express.Application {
  const app = express();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: config.maxUploadBytes,
    },
  });

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  // POST /lithophane: multipart image + expressions -> STL
  app.post(
    '/lithophane',
    upload.single('image'),
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        if (!req.file) {
          res.status(400).json({
            error: 'Bad request',
            message: 'No image file provided. Please upload an image using multipart/form-data with field name "image"',
          });
          return;
        }

        const fields = lithophaneFieldsSchema.parse(req.body);
        const stl = await generateLithophaneStl({
          xExpression: fields.xExpression,
          yExpression: fields.yExpression,
          zExpression: fields.zExpression,
          whiteDepth: fields.whiteDepth ?? config.defaultWhiteDepth,
          blackDepth: fields.blackDepth ?? config.defaultBlackDepth,
          image: req.file.buffer,
        }, { maxPixels: config.maxImagePixels });

        sendStl(res, stl, 'lithophane.stl');
      } catch (error) {
        next(error);
      }
    }
  );

  // POST /preview: JSON expressions + size -> STL
  app.post('/preview', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body = previewBodySchema.parse(req.body);
      const stl = await generatePreviewStl(body, { maxVertices: config.maxPreviewVertices });
      sendStl(res, stl, 'preview.stl');
    } catch (error) {
      next(error);
    }
  });

  // POST /dimensions: multipart image -> { width, height }
  app.post(
    '/dimensions',
    upload.single('image'),
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        if (!req.file) {
          res.status(400).json({
            error: 'Bad request',
            message: 'No image file provided. Please upload an image using multipart/form-data with field name "image"',
          });
          return;
        }
        res.json(await getImageDimensions(req.file.buffer));
      } catch (error) {
        next(error);
      }
    }
  );

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    const status = statusFor(err);
    if (status === 500) {
      logError('Unhandled error', err);
    }
    res.status(status).json({
      error: status === 500 ? 'Internal server error' : err.name,
      message: messageFor(err),
    });
  });

  return app;
}

/**
 * Start the server
 */
export function startServer(config: LithophaneConfig = loadConfig()): void {
  const app = createServer(config);

  app.listen(config.port, () => {
    info(`Server running on port ${config.port}`);
  });
}
