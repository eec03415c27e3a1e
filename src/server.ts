import 'dotenv/config';
import './utils/logger/fileLogger.js';
import helmet from 'helmet';
import express, { type ErrorRequestHandler } from 'express';
import reportRoutes from './routes/report.js';
import { defaultLimiter } from './middleware/rateLimiter.js';

const app = express();

app.use(helmet());
app.use(express.json({ limit: process.env.MAX_BODY_SIZE || '10mb' }));

app.get('/api/health', (req, res) => {
  return res
    .status(200)
    .json({ status: 'ok', timestamp: new Date().toISOString() });
});

app.use(defaultLimiter);

app.use((req, res, next) => {
  const start = process.hrtime.bigint();
  res.on('finish', () => {
    const duration = Number(process.hrtime.bigint() - start) / 1_000_000;
    console.log(`${req.method} ${req.originalUrl} ${res.statusCode} - ${duration.toFixed(2)} ms`);
  });

  next();
});

app.use('/report', reportRoutes);

app.use((req, res) => {
  res.status(404).json({ error: 'Not found' });
});

const errorHandler: ErrorRequestHandler = (error, req, res, _next) => {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number' && error.status < 500) {
    return res.status(error.status).json({ error: error.message });
  }

  console.error('Unhandled request error:', error);
  res.status(500).json({ error: 'Internal server error' });
};

app.use(errorHandler);

export default app;
