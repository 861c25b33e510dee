import { loadSettingsFromEnv, logger } from "@shared";
import { createApp } from "./app";

const port = Number(process.env.PORT) || 3000;

loadSettingsFromEnv();

const app = createApp();

app.listen(port, () => {
  logger.info(`Server listening on http://localhost:${port}`);
});
