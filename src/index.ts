import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './utils/config/config';
import { log } from './utils/logger';

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, () => {
  log(`Server is running on port ${config.port}`);
});
