/**
 * Lithophane Service
 * Main entry point
 */

import 'dotenv/config';
import { loadConfig } from './config.js';
import { startServer } from './server.js';
import { setLogLevel } from './utils/debug.js';

const config = loadConfig();
setLogLevel(config.logLevel);
startServer(config);
