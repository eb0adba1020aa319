import * as React from "react";
import { Text, Box, useApp, useStderr } from "ink";
import { option } from "pastel";
import { z } from "zod";
import { getRepoRoot } from "../lib/config.js";
import { runSetup, type SetupEvent, type SetupResult } from "../lib/setup.js";

export const options = z.object({
  // Pastel reads the alias from the inner schema, so describe before default
  publisher: z
    .string()
    .describe(
      option({
        description: "OpenVSX publisher ID (also --ovsx-publisher)",
        alias: "p",
      })
    )
    .default(""),
  extensionPath: z
    .string()
    .describe(
      option({
        description: "Path to the extension folder, relative to the repository root (also --path, --dir)",
        alias: "e",
      })
    )
    .default(""),
});

type Props = {
  options: z.infer<typeof options>;
};

type SetupState =
  | { status: "running" }
  | { status: "success"; result: Extract<SetupResult, { success: true }> }
  | { status: "error"; message: string; hint?: string[] };

const RULE = "==========================================";

export default function Setup({ options }: Props) {
  const { exit } = useApp();
  const { write } = useStderr();
  const [events, setEvents] = React.useState<SetupEvent[]>([]);
  const [state, setState] = React.useState<SetupState>({ status: "running" });

  React.useEffect(() => {
    function fail(message: string, hint?: string[]) {
      write(`Error: ${message}\n`);
      process.exitCode = 1;
      setState({ status: "error", message, hint });
    }

    async function setup() {
      const result = await runSetup({
        publisherName: options.publisher,
        extensionPath: options.extensionPath,
        repoRoot: getRepoRoot(),
        onEvent: (event) => setEvents((prev) => [...prev, event]),
      });

      if (!result.success) {
        fail(result.message, result.hint);
        return;
      }

      setState({ status: "success", result });
    }

    setup().catch((err: unknown) => {
      fail(err instanceof Error ? err.message : String(err));
    });
  }, [options.publisher, options.extensionPath]);

  React.useEffect(() => {
    if (state.status !== "running") {
      exit();
    }
  }, [state.status]);

  return (
    <Box flexDirection="column">
      <Text>{RULE}</Text>
      <Text bold>   OpenVSX Fork Configuration Assistant   </Text>
      <Text>{RULE}</Text>

      {events.map((event, i) => (
        <EventLine key={i} event={event} />
      ))}

      {state.status === "error" && state.hint && (
        <Box flexDirection="column">
          {state.hint.map((line, i) => (
            <Text key={i} color="red">{line}</Text>
          ))}
        </Box>
      )}

      {state.status === "success" && <Summary result={state.result} />}
    </Box>
  );
}

function EventLine({ event }: { event: SetupEvent }) {
  switch (event.type) {
    case "publisher_from_flag":
      return <Text>Using Publisher ID from flag: {event.value}</Text>;
    case "extension_path_from_flag":
      return <Text>Using Extension Path from flag: {event.value}</Text>;
    case "installing":
      return (
        <Box marginTop={1}>
          <Text bold>--- Installing Workflows ---</Text>
        </Box>
      );
    case "created":
      return <Text>Created {event.path}</Text>;
    case "staged":
      return <Text dimColor>Staged {event.path}</Text>;
  }
}

function Summary({ result }: { result: Extract<SetupResult, { success: true }> }) {
  return (
    <Box flexDirection="column">
      <Text color="green">✅ Workflow files created in .github/workflows/</Text>

      <Box flexDirection="column" marginTop={1}>
        <Text>{RULE}</Text>
        <Text bold color="green">   Setup Complete!                        </Text>
        <Text>{RULE}</Text>
      </Box>

      <Text>Next Steps:</Text>
      {result.nextSteps.map((step, i) => (
        <Box key={i} flexDirection="column">
          <Text>
            {i + 1}. {step.text}
          </Text>
          {step.commands?.map((command) => (
            <Text key={command} color="gray">   {command}</Text>
          ))}
        </Box>
      ))}
    </Box>
  );
}
