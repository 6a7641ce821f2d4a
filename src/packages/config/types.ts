export const types = {
  color: String,
  concurrency: String,
  'db-path': String,
  help: Boolean,
  json: Boolean,
  loglevel: String,
  reporter: String,
  'save-state': Boolean,
  source: String,
  'state-dir': String,
  version: Boolean,
};
