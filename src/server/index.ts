import { startServer } from './api';
import { CONFIG } from '../config';

startServer(CONFIG.PORT, {
  inputPath: process.env.INPUT_PATH || CONFIG.DEFAULT_INPUT,
});
