export { ScanSplitError, NotFoundError, InvalidConfigError } from './errors';
