/**
 * Infrastructure commands
 * Commands for validating, deploying and inspecting the App Service resources
 */

export { deployCommand } from './deploy';
export { validateCommand } from './validate';
export { statusCommand } from './status';
export { destroyCommand } from './destroy';
export { doctorCommand } from './doctor';
