import { useState, useEffect, type FormEvent } from 'react';
import { useNavigate } from 'react-router-dom';
import { toast } from 'sonner';
import { useAuth } from '@/hooks/useAuth';
import {
  passwordStrength,
  validateConfirmPassword,
  validateEmail,
  validateFullName,
  validatePassword,
  type PasswordStrength,
} from '@/lib/auth-rules';
import { cn } from '@/lib/cn';

type Mode = 'sign-in' | 'sign-up';

const STRENGTH_STYLES: Record<PasswordStrength, string> = {
  none: 'text-text-muted',
  weak: 'text-status-failed',
  medium: 'text-status-working',
  strong: 'text-status-stored',
};

const INPUT_CLASS =
  'w-full px-3 py-2 rounded-lg bg-white/[0.03] border border-white/[0.08] text-text-primary placeholder-text-muted text-sm focus:outline-none focus:border-brand/50 transition-colors';

export function LoginPage() {
  const { signIn, signUp, isAuthenticated, loading } = useAuth();
  const navigate = useNavigate();
  const [mode, setMode] = useState<Mode>('sign-in');
  const [fullName, setFullName] = useState('');
  const [email, setEmail] = useState('');
  const [password, setPassword] = useState('');
  const [confirmation, setConfirmation] = useState('');
  const [submitting, setSubmitting] = useState(false);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    if (isAuthenticated && !loading) {
      navigate('/dashboard', { replace: true });
    }
  }, [isAuthenticated, loading, navigate]);

  function firstValidationError(): string | null {
    const checks =
      mode === 'sign-up'
        ? [
            validateFullName(fullName),
            validateEmail(email),
            validatePassword(password),
            validateConfirmPassword(password, confirmation),
          ]
        : [validateEmail(email), validatePassword(password)];
    return checks.find((c) => c !== null) ?? null;
  }

  async function handleSubmit(e: FormEvent) {
    e.preventDefault();
    const invalid = firstValidationError();
    setError(invalid);
    if (invalid) return;

    setSubmitting(true);
    try {
      const result =
        mode === 'sign-up' ? await signUp({ fullName, email, password }) : await signIn(email, password);

      if (!result.ok) {
        setError(result.error);
        return;
      }
      if (mode === 'sign-up') {
        toast.success('Account created. Check your email to confirm, then sign in.');
        setMode('sign-in');
        return;
      }
      navigate('/dashboard', { replace: true });
    } finally {
      setSubmitting(false);
    }
  }

  if (loading) {
    return (
      <div className="min-h-screen flex items-center justify-center">
        <div className="w-8 h-8 border-2 border-text-muted border-t-brand rounded-full animate-spin" />
      </div>
    );
  }

  const strength = passwordStrength(password);

  return (
    <div className="min-h-screen flex items-center justify-center px-4">
      <div className="w-full max-w-sm">
        <div className="text-center mb-8">
          <h1 className="text-2xl font-bold tracking-tight text-text-primary">Founder Console</h1>
          <p className="mt-2 text-sm text-text-secondary">
            {mode === 'sign-in' ? 'Sign in to manage your startup profile' : 'Create your startup account'}
          </p>
        </div>

        <form
          onSubmit={handleSubmit}
          noValidate
          className="p-6 rounded-2xl border border-white/[0.08] bg-white/[0.02] backdrop-blur-xl space-y-4"
        >
          {mode === 'sign-up' && (
            <div>
              <label htmlFor="fullName" className="block text-sm font-medium text-text-secondary mb-1.5">
                Full name
              </label>
              <input
                id="fullName"
                value={fullName}
                onChange={(e) => setFullName(e.target.value)}
                className={INPUT_CLASS}
                placeholder="Ada Founder"
              />
            </div>
          )}

          <div>
            <label htmlFor="email" className="block text-sm font-medium text-text-secondary mb-1.5">
              Email
            </label>
            <input
              id="email"
              type="email"
              value={email}
              onChange={(e) => setEmail(e.target.value)}
              className={INPUT_CLASS}
              placeholder="you@example.com"
            />
          </div>

          <div>
            <label htmlFor="password" className="block text-sm font-medium text-text-secondary mb-1.5">
              Password
            </label>
            <input
              id="password"
              type="password"
              value={password}
              onChange={(e) => setPassword(e.target.value)}
              className={INPUT_CLASS}
              placeholder="••••••••"
            />
            {mode === 'sign-up' && strength !== 'none' && (
              <p className={cn('mt-1 text-[11px] font-medium capitalize', STRENGTH_STYLES[strength])}>{strength}</p>
            )}
          </div>

          {mode === 'sign-up' && (
            <div>
              <label htmlFor="confirmation" className="block text-sm font-medium text-text-secondary mb-1.5">
                Confirm password
              </label>
              <input
                id="confirmation"
                type="password"
                value={confirmation}
                onChange={(e) => setConfirmation(e.target.value)}
                className={INPUT_CLASS}
                placeholder="••••••••"
              />
            </div>
          )}

          {error && <p className="text-sm text-status-failed">{error}</p>}

          <button
            type="submit"
            disabled={submitting}
            className="w-full py-2.5 rounded-xl bg-brand/20 text-brand font-semibold text-sm border border-brand/20 hover:bg-brand/30 disabled:opacity-50 disabled:cursor-not-allowed transition-all"
          >
            {submitting ? 'Please wait...' : mode === 'sign-in' ? 'Sign In' : 'Create Account'}
          </button>
        </form>

        <button
          type="button"
          onClick={() => {
            setMode(mode === 'sign-in' ? 'sign-up' : 'sign-in');
            setError(null);
          }}
          className="mt-6 block w-full text-center text-xs text-text-secondary hover:text-brand transition-colors"
        >
          {mode === 'sign-in' ? "Don't have an account? Sign up" : 'Already have an account? Sign in'}
        </button>
      </div>
    </div>
  );
}
