// apps/mock-endpoint/src/index.ts
import { createApp } from "./app";

const port = process.env.PORT ? Number(process.env.PORT) : 8000;
const slowFrameMs = process.env.MOCK_SLOW_FRAME_MS ? Number(process.env.MOCK_SLOW_FRAME_MS) : undefined;

const app = createApp(slowFrameMs === undefined ? {} : { slowFrameMs });

app.listen(port, () => {
  console.log(`mock-endpoint listening on http://localhost:${port}/v1`);
});
