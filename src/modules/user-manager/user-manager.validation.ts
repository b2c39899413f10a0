import { z } from 'zod';

// Validation schemas for the User Manager module
export const createUserSchema = z.object({
  username: z.string().trim().min(3, 'username must have at least 3 characters').max(100),
  email: z.string().trim().email('email is invalid'),
  full_name: z.string().trim().min(1, 'full_name is required'),
  password: z.string().min(8, 'password must have at least 8 characters'),
  role: z.string().trim().min(1).optional(),
});

export const roleBodySchema = z.object({
  role: z.string().trim().min(1, 'role is required'),
});

export const userStatusSchema = z.object({
  is_active: z.boolean({ required_error: 'is_active is required' }),
});

export const updateProfileSchema = z
  .object({
    full_name: z.string().trim().min(1, 'full_name must not be empty').optional(),
    email: z.string().trim().email('email is invalid').optional(),
  })
  .refine(data => data.full_name !== undefined || data.email !== undefined, {
    message: 'full_name or email is required',
  });

export const resetPasswordSchema = z.object({
  new_password: z.string().min(8, 'new_password must have at least 8 characters'),
  confirm_password: z.string().min(8),
}).refine(data => data.new_password === data.confirm_password, {
  message: 'confirm_password does not match',
  path: ['confirm_password'],
});
