// Environment variables read by corgi
export const ENV_HOME = 'HOME';
export const ENV_XDG_CONFIG_HOME = 'XDG_CONFIG_HOME';
export const ENV_XDG_STATE_HOME = 'XDG_STATE_HOME';
export const ENV_EDITOR = 'EDITOR';
export const ENV_PATH = 'PATH';
export const ENV_LOG_FILE = 'CORGI_LOG_FILE';
