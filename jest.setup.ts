import { configureLogging } from './src/logging/logger';

// Keep test output readable: no stderr echo, no log file.
configureLogging({ stderr: false, file: null });
