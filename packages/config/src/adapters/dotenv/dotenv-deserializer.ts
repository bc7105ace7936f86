import { parse } from "dotenv"
import type { Deserializer } from "../../ports/deserializer"

/**
 * Parses `KEY=value` lines. Every value comes back as a string; dotenv does
 * not interpolate or coerce.
 */
export const dotenvDeserializer: Deserializer = (content) => parse(content)
