import React from "react";
import { render } from "ink";
import { App } from "./App.js";
import type { SessionRecord } from "../schemas/transcript.js";

export async function launchTui(
  sessions: SessionRecord[],
  previewLimit: number,
): Promise<void> {
  const { unmount, waitUntilExit } = render(
    <App sessions={sessions} previewLimit={previewLimit} onQuit={() => unmount()} />,
    { exitOnCtrlC: true },
  );
  await waitUntilExit();
}
