// Keep test output free of telemetry log lines.
process.env.TRL_TELEMETRY_LOGS = 'false';
