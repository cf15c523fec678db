import dotenv from 'dotenv';

// Must be imported before anything that reads process.env (logger, env schema).
dotenv.config();
