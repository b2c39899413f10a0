// User Model - users / roles / user_roles tables

export interface User {
  id: number;
  username: string; // unique
  email: string; // unique
  full_name: string;
  password_hash: string;
  is_active: boolean;
  refresh_token: string | null;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null; // Soft delete
}

export interface Role {
  id: number;
  name: string; // unique
  description: string | null;
  created_at: Date;
}

export interface UserRole {
  id: number;
  user_id: number;
  role_id: number;
  assigned_by: number | null;
  created_at: Date;
}

export interface UserWithRoles extends User {
  roles: string[];
}

// Shape returned to API callers
export type PublicUser = Omit<UserWithRoles, 'password_hash' | 'refresh_token' | 'deleted_at'>;

export interface CreateUserInput {
  username: string;
  email: string;
  full_name: string;
  password_hash: string;
}

export interface UserProfilePatch {
  full_name?: string;
  email?: string;
}

export const toPublicUser = ({ password_hash: _hash, refresh_token: _token, deleted_at: _deleted, ...rest }: UserWithRoles): PublicUser => rest;
