import path from 'path'
import dotenv from 'dotenv'

/** `.env.local` at the repository root, next to `.env.example` */
export const ENV_FILE = path.resolve(__dirname, '../../.env.local')

export default function dotenvConfig() {

  dotenv.config({
    path: ENV_FILE,
  });

}
