export { configCommand, getGlobalDefaults } from './config.js';
export { pullUpCommand, type PullUpCommandOptions } from './pull-up.js';
export { classesCommand, methodsCommand, ancestorsCommand } from './classes.js';
export { restoreCommand, snapshotsCommand } from './restore.js';
