export const APP_NAME = 'bytesight'
export const VERSION = '0.1.0'
