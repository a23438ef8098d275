// keep pino quiet unless a test opts in
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent'
