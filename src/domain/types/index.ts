export { Support, DEFAULT_SUPPORT, parseSupport, supportMinimum } from './support';
