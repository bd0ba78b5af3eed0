import { z } from 'zod';

const required = z.string().min(1);

export const signupSchema = z.object({
  first_name: required,
  last_name: required,
  email: required,
  password: required,
});

export const loginSchema = z.object({
  username: required,
  password: required,
});
