export * from './common.enum';
