/**
 * Tool descriptions for system prompt injection.
 */
export { LOW_FLOAT_SCREEN_DESCRIPTION } from './low-float-screen.js';
