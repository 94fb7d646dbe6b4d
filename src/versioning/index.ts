export * from './command-runner.js';
export * from './tool-probe.js';
export * from './metadata.js';
export * from './repository.js';
export * from './publish.js';
