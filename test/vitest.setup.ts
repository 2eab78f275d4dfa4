const setIfMissing = (key: string, value: string) => {
  if (!process.env[key]) {
    process.env[key] = value;
  }
};

setIfMissing('NODE_ENV', 'test');
// Engine and coordinator log through console; keep test output to real failures.
setIfMissing('THREADLINE_LOG_LEVEL', 'ERROR');
