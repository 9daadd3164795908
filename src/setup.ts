// Loaded before anything reads process.env.
import dotenv from 'dotenv';

dotenv.config();
