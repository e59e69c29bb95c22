export const CLI_NAME = 'envguard';
export const CLI_VERSION = '0.1.0';
