import dotenv from 'dotenv';

import { createApp } from './app';
import { loadConfig } from './config';
import { getFaxBackend } from './fax';

dotenv.config();

const config = loadConfig();
const backend = getFaxBackend(config);
const app = createApp({ backend, config });

const server = app.listen(config.port, config.bindHost, (error?: Error) => {
  // Express hands listen failures to this callback as well as the 'error' event below.
  if (error) return;
  console.log(`fax-gateway listening on ${config.bindHost}:${config.port}`);
  console.log(`  Fax backend: ${backend.name} (${config.hylafax.host})`);
  console.log(`  Upload folder: ${config.uploadFolder}`);
});

server.on('error', (error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`fax-gateway failed to start: ${message}`);
  process.exit(1);
});
