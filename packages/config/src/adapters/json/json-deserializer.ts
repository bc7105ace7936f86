import type { Deserializer } from "../../ports/deserializer"

export const jsonDeserializer: Deserializer = (content) => JSON.parse(content)
