import { z } from 'zod';
import { METHOD_IDS } from './types.js';

/**
 * Schema for MethodId.
 */
export const methodIdSchema = z.enum(METHOD_IDS);
