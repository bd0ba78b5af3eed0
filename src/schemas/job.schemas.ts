import { z } from 'zod';

const required = z.string().min(1);

export const postJobSchema = z.object({
  title: required,
  description: required,
  // Kept as text: the service decides what a usable number is.
  budget: z.union([required, z.number().transform(String)]),
});

export const applySchema = z.object({
  applicant_name: required,
  proposal: required,
});
