export default {
  columns: {
    primary: "PM2.5 (µg/m³)",
    secondary: "PM10 (µg/m³)",
    timestamp: "Timestamp",
  },
  anomalyThresholdPercent: 1,
  zScoreCutoff: 3,
  maxIterations: 5,
  llm: {
    baseUrl: "http://localhost:11434/v1",
    model: "mistral:7b",
    apiKey: "ollama",
  },
};
