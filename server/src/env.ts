/**
 * Load env so AZURE_OPENAI_* and job limits are set before config is read.
 * Must be the first import in index.ts.
 */
import 'dotenv/config'
import dotenv from 'dotenv'
import path from 'path'
import fs from 'fs'

// Project root .env (used by docker-compose); try cwd then __dirname so it works regardless of how server is started
const rootEnvCwd = path.join(process.cwd(), '..', '.env')
const rootEnvDir = path.join(__dirname, '..', '..', '.env')
const rootEnv = fs.existsSync(rootEnvCwd) ? rootEnvCwd : fs.existsSync(rootEnvDir) ? rootEnvDir : null
if (rootEnv && !process.env.AZURE_OPENAI_API_KEY) {
  dotenv.config({ path: rootEnv, override: false })
}
