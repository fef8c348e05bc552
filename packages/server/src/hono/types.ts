import type { createTasklaneApp } from './index.js';

export type TasklaneApp = ReturnType<typeof createTasklaneApp>;
