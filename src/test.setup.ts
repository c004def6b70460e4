// Keep the logger quiet and off the pretty transport during Vitest runs.
process.env.DEADLINE_LOG_LEVEL = process.env.DEADLINE_LOG_LEVEL ?? 'silent';
process.env.DEADLINE_PRETTY_LOGS = 'false';
