// JSON logs would drown test output; opt back in with LOG_LEVEL=debug
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'silent';
}
