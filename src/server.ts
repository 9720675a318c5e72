import app from './app';
import { config, getOpenAIConfig } from './config';
import { safeLogger } from './security/safeLogger';

app.listen(config.port, () => {
  safeLogger.info('server.started', {
    port: config.port,
    degreeDecimals: config.report.degreeDecimals,
    advisoryEnabled: Boolean(getOpenAIConfig().apiKey),
  });
});
