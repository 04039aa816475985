import pino from 'pino';

export const logger = pino({
  name: 'gpuscope',
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: () => `,"time":"${new Date().toISOString()}"`,
  redact: ['req.headers.authorization', 'headers.authorization'],
});

/**
 * Logger bound to one component, e.g. `componentLogger('prometheus')`
 */
export function componentLogger(component: string) {
  return logger.child({ component });
}

export default logger;
