export * from './record-export';
