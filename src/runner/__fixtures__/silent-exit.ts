// Stands in for a runner that dies before replying.
export {};

process.exit(3);
