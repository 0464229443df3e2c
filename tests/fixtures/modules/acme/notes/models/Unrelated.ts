export const unrelated = 42;
