import { config as loadEnv } from "dotenv";

loadEnv();
