export { normalizeSchema, LABEL } from './schema';
export { RecordProjector } from './projector';
export type { ProjectionResult, ProjectorOptions } from './projector';
