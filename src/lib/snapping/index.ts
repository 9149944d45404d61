export * from './types';
export { SnappingEngine } from './SnappingEngine';
