// tests/setup.ts
// Runs before each test file, ahead of the env schema parse.
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
