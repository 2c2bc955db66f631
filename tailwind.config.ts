import type { Config } from 'tailwindcss';

export default {
  content: ['./index.html', './src/**/*.{ts,tsx}'],
  theme: {
    extend: {
      colors: {
        crystal: {
          base: '#0a0a0f',
          surface: '#0d1117',
          elevated: '#161b22',
          border: 'rgba(255,255,255,0.08)',
          'border-hover': 'rgba(255,255,255,0.12)',
          muted: '#475569',
        },
        brand: {
          DEFAULT: '#ffa500',
          soft: '#ffc04d',
          deep: '#e69500',
        },
        status: {
          staged: '#3b82f6',
          working: '#f59e0b',
          stored: '#10b981',
          failed: '#ef4444',
          submitting: '#8b5cf6',
        },
        text: {
          primary: '#f1f5f9',
          secondary: '#94a3b8',
          muted: '#475569',
        },
      },
      fontFamily: {
        sans: ['Satoshi', 'system-ui', 'sans-serif'],
        mono: ['JetBrains Mono', 'monospace'],
      },
      backdropBlur: {
        'glass-1': '8px',
        'glass-2': '16px',
        'glass-3': '24px',
      },
      keyframes: {
        'pulse-glow-amber': {
          '0%, 100%': { boxShadow: '0 0 8px rgba(245, 158, 11, 0.3)' },
          '50%': { boxShadow: '0 0 20px rgba(245, 158, 11, 0.6)' },
        },
        'pulse-glow-violet': {
          '0%, 100%': { boxShadow: '0 0 8px rgba(139, 92, 246, 0.3)' },
          '50%': { boxShadow: '0 0 20px rgba(139, 92, 246, 0.6)' },
        },
      },
      animation: {
        'pulse-glow-amber': 'pulse-glow-amber 1.5s ease-in-out infinite',
        'pulse-glow-violet': 'pulse-glow-violet 1.5s ease-in-out infinite',
      },
    },
  },
  plugins: [],
} satisfies Config;
