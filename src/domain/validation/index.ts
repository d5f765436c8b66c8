export { ParameterValidator } from './ParameterValidator';
export type { ProbabilityOptions } from './ParameterValidator';
