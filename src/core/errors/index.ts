export { DiscretaError, ErrorCode, isDiscretaError, wrapError } from './DiscretaError';
