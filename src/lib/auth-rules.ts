export type PasswordStrength = 'none' | 'weak' | 'medium' | 'strong';

const EMAIL_PATTERN = /^[\w.-]+@([\w-]+\.)+[\w-]{2,4}$/;

export function validateFullName(value: string): string | null {
  const trimmed = value.trim();
  if (!trimmed) return 'Full name is required';
  if (trimmed.length < 2) return 'Full name must be at least 2 characters';
  return null;
}

export function validateEmail(value: string): string | null {
  const trimmed = value.trim();
  if (!trimmed) return 'Email is required';
  return EMAIL_PATTERN.test(trimmed) ? null : 'Please enter a valid email address';
}

export function validatePassword(value: string): string | null {
  if (!value) return 'Password is required';
  return value.length < 6 ? 'Password must be at least 6 characters' : null;
}

export function validateConfirmPassword(password: string, confirmation: string): string | null {
  if (!confirmation) return 'Please confirm your password';
  return password === confirmation ? null : 'Passwords do not match';
}

/**
 * One point each for length ≥ 8, length ≥ 12, lower case, upper case,
 * digit and symbol. 0–2 weak, 3–4 medium, 5–6 strong.
 */
export function passwordStrength(password: string): PasswordStrength {
  if (!password) return 'none';

  const checks = [
    password.length >= 8,
    password.length >= 12,
    /[a-z]/.test(password),
    /[A-Z]/.test(password),
    /[0-9]/.test(password),
    /[!@#$%^&*(),.?":{}|<>]/.test(password),
  ];
  const score = checks.filter(Boolean).length;

  if (score <= 2) return 'weak';
  if (score <= 4) return 'medium';
  return 'strong';
}
