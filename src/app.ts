/**
 * Express app without server startup, so tests can drive it with supertest.
 * The listen() call is in server.ts.
 */

import express from 'express';
import type { Express } from 'express';
import { crawlRouter } from './routes/crawl';
import { pricesRouter } from './routes/prices';
import { analysisRouter } from './routes/analysis';
import { categoriesRouter } from './routes/categories';
import { productsRouter } from './routes/products';
import { variationsRouter } from './routes/variations';
import { settingsRouter } from './routes/settings';
import { errorHandler, notFoundHandler } from './middleware/error-handler';

export const app: Express = express();

app.use(express.json());

app.get('/healthz', (_req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

app.use('/api/crawl', crawlRouter);
app.use('/api/prices', pricesRouter);
app.use('/api', analysisRouter);
app.use('/api/categories', categoriesRouter);
app.use('/api/products', productsRouter);
app.use('/api/variations', variationsRouter);
app.use('/api/settings', settingsRouter);

app.use(notFoundHandler);
app.use(errorHandler);
