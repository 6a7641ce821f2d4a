export const EOL = '\n';
