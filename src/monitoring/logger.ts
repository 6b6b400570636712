import pino from 'pino';

export const logger = pino({
  name: 'streamcap',
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level(label) {
      return { level: label };
    },
  },
});

/** Drop an IPv4-mapped IPv6 prefix so log lines and keys read as plain IPv4. */
export function normalizeIp(ip: string): string {
  return ip.replace(/^::ffff:/, '');
}
