import { config } from './config';
import { createApp } from './app';
import { createRoutingService } from './routing/service';
import { childLogger } from './utils/logger';

const logger = childLogger('http');

const service = createRoutingService();
const app = createApp(service);

if (process.env.NODE_ENV !== 'test') {
  service.startSessionSweeper(config.sessionSweepIntervalMs);
  app.listen(config.port, () => {
    logger.info(`Intent router listening on http://localhost:${config.port}`);
  });
}

export default app;
