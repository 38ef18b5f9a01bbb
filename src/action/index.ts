// GitHub Action entrypoint. Bundled with its dependencies into action/dist/index.cjs by the build:gha script.
import { run } from './run.js';

run();
