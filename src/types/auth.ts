export const USER_TYPES = ['startup', 'investor'] as const;

export type UserType = (typeof USER_TYPES)[number];

export interface SessionUser {
  id: string;
  email: string;
  fullName: string | null;
  userType: UserType | null;
}

export interface SignUpInput {
  fullName: string;
  email: string;
  password: string;
}
