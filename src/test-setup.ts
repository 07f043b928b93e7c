process.env.CHECKIN_LOG_LEVEL = process.env.CHECKIN_LOG_LEVEL || 'silent';
