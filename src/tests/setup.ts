// loaded by mocha before any test file imports the config
process.env.LOG_LEVEL = "silent";
process.env.DB_CONNECTION_STRING = "sqlite::memory:";
process.env.SEED_DEMO_DATA = "false";
