import fs from 'fs'
import path from 'path'

export const parseEnvLine = (line: string) => {
  const idx = line.indexOf('=')
  if (idx === -1) return null
  const key = line.slice(0, idx).trim()
  let value = line.slice(idx + 1).trim()
  if (!key) return null
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    value = value.slice(1, -1)
  }
  return { key, value }
}

// Values already present in the environment win over the file.
export const loadEnv = (envPath = path.resolve(process.cwd(), '.env'), target: NodeJS.ProcessEnv = process.env) => {
  if (!fs.existsSync(envPath)) return
  let content: string
  try {
    content = fs.readFileSync(envPath, 'utf8')
  } catch (e) {
    console.warn(`[startup] could not read ${envPath}`, e)
    return
  }
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim()
    if (!line || line.startsWith('#')) continue
    const parsed = parseEnvLine(line)
    if (!parsed) continue
    if (target[parsed.key] === undefined || target[parsed.key] === '') {
      target[parsed.key] = parsed.value
    }
  }
}
