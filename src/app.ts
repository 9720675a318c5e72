import cors from 'cors';
import express from 'express';
import morgan from 'morgan';
import helmet from 'helmet';
import routes from './routes';
import { config } from './config';
import { errorHandler, notFound } from './middleware/error.middleware';

const app = express();

app.use(
  cors({
    origin: config.corsOrigins,
    exposedHeaders: ['Content-Disposition'],
  })
);
app.use(helmet());
app.use(express.json({ limit: config.bodyLimit }));
if (process.env.NODE_ENV !== 'test') {
  app.use(morgan('dev'));
}

app.get('/health', (_req, res) => {
  res.json({ status: 'ok', service: 'change-impact-api', timestamp: new Date().toISOString() });
});

app.use('/api', routes);

app.use(notFound);
app.use(errorHandler);

export default app;
