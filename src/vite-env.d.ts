// Build-mode flag for dead code elimination. Vitest defines it as true;
// library builds rewrite it to a NODE_ENV check (see vite.config.ts).
declare const __DEV__: boolean;
