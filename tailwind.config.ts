import type { Config } from 'tailwindcss';

export default {
  content: ['./index.html', './App.tsx', './components/**/*.tsx', './src/**/*.tsx'],
  theme: {
    extend: {},
  },
  plugins: [],
} satisfies Config;
