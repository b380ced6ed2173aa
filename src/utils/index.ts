/**
 * Utilities Module
 */

export { formatTable, visibleLength, type Column, type Alignment, type Row } from './table.js';
export { consoleLogger, silentLogger, type Logger } from './logger.js';
