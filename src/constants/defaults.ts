// Locations relative to the config home
export const DEFAULT_CONFIG_FILE = '.corgi/corgi_conf.json';
export const DEFAULT_SNIPPETS_DIR = '.corgi/snippets';
export const DEFAULT_SNIPPETS_FILE = '.corgi/snippets.json';

// Mode for directories and files created on demand
export const DEFAULT_PATH_PERMISSIONS = 0o755;
// Mode for the config file when it is rewritten
export const CONFIG_FILE_PERMISSIONS = 0o644;

export const DEFAULT_EDITOR = 'vim';
export const DEFAULT_FILTER_CMD_FZF = 'fzf';
export const DEFAULT_FILTER_CMD_PECO = 'peco';

export const EDITOR_REMEDY_COMMAND =
	'corgi configure --editor <path to your editor>';

// JSON layout of the config file
export const JSON_MARSHAL_PREFIX = '';
export const JSON_MARSHAL_INDENT = '  ';
