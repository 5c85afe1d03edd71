import pino from 'pino';

// stdout carries the MCP protocol, so logs go to stderr.
export const logger = pino(
  {
    name: 'hemis-mcp',
    level: process.env.LOG_LEVEL || 'info',
  },
  pino.destination(2)
);

export default logger;
