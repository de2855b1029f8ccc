/**
 * Kiln Runtime Host: Worker Entry Point
 *
 * Forked by ForkedProcessRunner. Not imported by anything else.
 */

import { startWorker } from './process-worker.js';

startWorker();
