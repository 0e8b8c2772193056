/**
 * Input/output boundary: row normalization, configuration parsing, export records
 */

export * from './values';
export * from './walls';
export * from './openings';
export * from './config';
export * from './panel-records';
