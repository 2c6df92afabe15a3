import { readFileSync } from "node:fs"
import { loadDatabase } from "../src/index"
import type { InMemoryDatabase } from "../src/index"

export function fixtureSource(name = "factory.yaml"): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf8")
}

/** The shared test factory: a handful of ores, ingots, parts, buildings and recipes. */
export function loadFixtureDatabase(): InMemoryDatabase {
  const loaded = loadDatabase(fixtureSource())
  if (!loaded.ok) {
    throw new Error(`${loaded.error.message}: ${loaded.error.issues.join("; ")}`)
  }
  return loaded.value
}
