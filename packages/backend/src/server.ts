import express from 'express';
import cors from 'cors';
import { jsonReplacer } from '@crash-triage/symbolizer';
import { getConfig } from './config.js';
import uploadRouter from './routes/upload.js';
import analyzeRouter from './routes/analyze.js';
import reportsRouter from './routes/reports.js';

const app = express();

// Middleware
app.use(cors());
app.use(express.json({ limit: '10mb' }));
// Crash groups carry Sets; serialize them as sorted arrays
app.set('json replacer', jsonReplacer);

// Health check
app.get('/api/health', (_req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

// Routes
app.use('/api/upload', uploadRouter);
app.use('/api/analyze', analyzeRouter);
app.use('/api/reports', reportsRouter);

// Error handler
app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
  console.error('[Server Error]', err.message);
  res.status(500).json({ error: err.message });
});

// Start
const config = getConfig();
app.listen(config.port, () => {
  console.log(`[crash-triage] Backend running on http://localhost:${config.port}`);
  console.log(`[crash-triage] Data dir: ${config.dataDir}`);
  console.log(`[crash-triage] Symbols: ${config.symbols.baseUrl} (cache ${config.symbols.cacheDir})`);
});

export default app;
