import pino from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level(label) {
      return { level: label };
    },
  },
});

/** Mask an address for logging: 1415555**** */
export function maskAddress(address: string): string {
  if (address.length <= 6) return address;
  return address.slice(0, -4) + '****';
}
