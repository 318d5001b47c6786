process.env.LOG_LEVEL = "silent";
process.env.LOGGING_OUTPUT_FORMAT = "json";
