// Keep command output out of test logs; tests that check output pass their own logger
process.env.MODFORGE_LOG_LEVEL = process.env.MODFORGE_LOG_LEVEL || 'error'
process.env.NO_COLOR = process.env.NO_COLOR || '1'
