// pattern: Functional Core
import type { WindowSummary } from "../sources";

const TEMPERATURE_ADVICE: ReadonlyArray<{
  readonly below: number;
  readonly advice: string;
}> = [
  { below: 0, advice: "Heavy winter coat and warm layers 🧥" },
  { below: 5, advice: "Thick jacket and sweater 🧥" },
  { below: 10, advice: "Jacket and light sweater 🧥" },
  { below: 15, advice: "Light jacket or hoodie 👕" },
  { below: 20, advice: "Hoodie or light cardigan 👕" },
];

const WARM_ADVICE = "Light clothing, t-shirt is fine 👕";

/**
 * Suggests what to wear from the daytime forecast: the mean of the day's
 * temperature range picks a layer, and the highest rain probability adds an
 * umbrella above 30%.
 */
export function recommendClothing(day: WindowSummary): string {
  const averageTemperature = (day.temperature.min + day.temperature.max) / 2;
  const rainChance = day.precipitationProbability.max;

  const parts = [
    TEMPERATURE_ADVICE.find((step) => averageTemperature < step.below)
      ?.advice ?? WARM_ADVICE,
  ];

  if (rainChance > 50) {
    parts.push("Don't forget your umbrella! ☔");
  } else if (rainChance > 30) {
    parts.push("Bring an umbrella just in case ☂️");
  }

  return parts.join(" | ");
}
