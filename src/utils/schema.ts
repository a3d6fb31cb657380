import type { z } from 'zod';

/** Any zod schema producing `T`, whatever its input type. */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;
