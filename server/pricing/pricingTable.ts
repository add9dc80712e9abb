import { ChatError } from "../chat/errors.js";

export type ModelRate = {
  inputRatePerMToken: number;
  outputRatePerMToken: number;
};

export type ModelPricing = ModelRate & {
  id: string;
  label: string;
  providerModelId: string;
};

export const DEFAULT_MODEL = "sonnet-4.5";

// USD per million tokens.
const MODEL_CATALOG: Record<string, ModelPricing> = {
  "sonnet-4.5": {
    id: "sonnet-4.5",
    label: "Claude Sonnet 4.5",
    providerModelId: "claude-sonnet-4-5-20250929",
    inputRatePerMToken: 3,
    outputRatePerMToken: 15,
  },
  "opus-4": {
    id: "opus-4",
    label: "Claude Opus 4",
    providerModelId: "claude-opus-4-20250514",
    inputRatePerMToken: 15,
    outputRatePerMToken: 75,
  },
  "sonnet-4": {
    id: "sonnet-4",
    label: "Claude Sonnet 4",
    providerModelId: "claude-sonnet-4-20250514",
    inputRatePerMToken: 3,
    outputRatePerMToken: 15,
  },
};

export function isKnownModel(model: string): boolean {
  return Object.hasOwn(MODEL_CATALOG, model);
}

export function resolveModel(model: string): ModelPricing {
  const entry = isKnownModel(model) ? MODEL_CATALOG[model] : undefined;
  if (!entry) {
    const known = Object.keys(MODEL_CATALOG).join(", ");
    throw new ChatError("unknown_model", `Unknown model "${model}" (known: ${known})`);
  }
  return entry;
}

export function rateFor(model: string): ModelRate {
  const { inputRatePerMToken, outputRatePerMToken } = resolveModel(model);
  return { inputRatePerMToken, outputRatePerMToken };
}

export function listModels(): ModelPricing[] {
  return Object.values(MODEL_CATALOG);
}
