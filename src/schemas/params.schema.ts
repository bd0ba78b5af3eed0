import { z } from 'zod';
import { NotFoundError } from '../utils/errors';

const idSchema = z.coerce.number().int().positive();

/** Path ids that are not positive integers cannot name a row. */
export function parseId(raw: string | undefined, resource: string): number {
  const parsed = idSchema.safeParse(raw);
  if (!parsed.success) throw new NotFoundError(resource);
  return parsed.data;
}
