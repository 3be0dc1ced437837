import fs from "node:fs"
import path from "node:path"

export interface LoadEnvOptions {
    /** Defaults to `.env` in the current working directory. */
    envFilePath?: string
    target?: NodeJS.ProcessEnv
}

/**
 * Copy `KEY=value` pairs from a dotenv file into `target` (process.env by default).
 * Keys already present in the target are left intact. Returns the keys applied.
 */
export function loadEnv(options: LoadEnvOptions = {}): string[] {
    const filePath = path.resolve(options.envFilePath ?? ".env")
    const target = options.target ?? process.env

    if (!fs.existsSync(filePath)) return []

    let content: string
    try {
        content = fs.readFileSync(filePath, "utf8")
    } catch (error) {
        console.warn(`[env] Could not read ${filePath}:`, error)
        return []
    }

    const applied: string[] = []
    for (const [key, value] of parseEnvFile(content)) {
        if (target[key] !== undefined) continue
        target[key] = value
        applied.push(key)
    }
    return applied
}

export function parseEnvFile(content: string): Map<string, string> {
    const entries = new Map<string, string>()

    for (const rawLine of content.split(/\r?\n/)) {
        let line = rawLine.trim()
        if (!line || line.startsWith("#")) continue
        if (line.startsWith("export ")) line = line.slice("export ".length).trim()

        const eq = line.indexOf("=")
        if (eq <= 0) continue

        const key = line.slice(0, eq).trim()
        if (!key) continue

        entries.set(key, parseValue(line.slice(eq + 1).trim()))
    }

    return entries
}

function parseValue(raw: string): string {
    const quote = raw[0]
    if ((quote === '"' || quote === "'") && raw.length >= 2 && raw.endsWith(quote)) {
        const inner = raw.slice(1, -1)
        if (quote === "'") return inner
        return inner.replace(/\\n/g, "\n").replace(/\\r/g, "\r").replace(/\\t/g, "\t")
    }

    // unquoted values may carry a trailing "# comment"
    const hash = raw.indexOf(" #")
    return hash === -1 ? raw : raw.slice(0, hash).trimEnd()
}
