import { setLogHandler } from '../src/logger';

// Keep test output quiet; individual tests install their own handler when they assert on logs.
setLogHandler(() => {});
