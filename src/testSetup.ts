
// Keep the internal logger quiet while the suites run.
process.env.LOGPRISM_LOG_LEVEL = 'silent';
