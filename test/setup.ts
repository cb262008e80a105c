// test/setup.ts
// Keep test output quiet unless a run asks for logs explicitly.
process.env.DTO_LOG_LEVEL ??= "silent";
