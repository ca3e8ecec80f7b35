/**
 * Server entry point
 */

import 'dotenv/config';
import { run } from './main.js';

void run();
