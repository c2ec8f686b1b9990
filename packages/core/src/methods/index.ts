/**
 * Calculation method registry.
 */

export type {
  MethodId,
  IshaRule,
  MethodParameters,
  MethodAdjustments,
  CalculationMethod,
} from './types.js';

export { METHOD_IDS } from './types.js';

export {
  ASR_SHADOW_FACTORS,
  CALCULATION_METHODS,
  isMethodId,
  listMethods,
  methodFor,
  parametersFor,
} from './registry.js';

export { methodIdSchema } from './validation.js';
