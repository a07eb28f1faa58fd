export { StateClient } from './client';
export type { StateClientConfig } from './client';
