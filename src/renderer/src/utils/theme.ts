// Rose Pine Moon.
export const theme = {
  border: '#44415a',
  text: '#e0def4',
  muted: '#6e6a86',
  subtle: '#908caa',
  accent: '#c4a7e7',
  match: '#f6c177',
  terminalMarker: '#3e8fb0',
  info: '#9ccfd8',
  error: '#eb6f92',
} as const;

export const MODE_PROMPTS = {
  apps: 'apps',
  files: 'files',
} as const;
