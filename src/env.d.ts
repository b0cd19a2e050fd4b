// Global build-mode flag for dead code elimination.
// Vitest defines it as `true`; the library build rewrites it to a
// process.env.NODE_ENV check.
declare const __DEV__: boolean;
