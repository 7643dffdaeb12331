import { Command, CommanderError } from "commander"
import { z } from "zod"

export type GatewayCommand =
  | { name: "help" }
  | { name: "models" }
  | { name: "catalog"; query: string; refresh: boolean }
  | { name: "info"; model: string }
  | { name: "pull"; model: string }
  | { name: "delete"; model: string }
  | { name: "ask"; prompt: string; model: string | null; images: string[] }
  | { name: "health" }

export const usage = `Usage: ollama-gateway <command> [options]

Commands:
  models                               list local models
  catalog [query] [--refresh]          search the public model catalog
  info <model>                         show model details
  pull <model>                         download a model (Ctrl+C cancels)
  delete <model>                       delete a local model
  ask <prompt...> [--model <name>] [--image <path>]...
                                       route a prompt to a suitable model and print the reply
  health                               check that the backend answers
`

const HELP_ARGUMENTS = new Set(["help", "--help", "-h"])

const HELP_ERROR_CODES = new Set(["commander.helpDisplayed", "commander.help"])

const catalogOptionsSchema = z.object({
  refresh: z.boolean().default(false),
})

const askOptionsSchema = z.object({
  model: z.string().trim().min(1).optional(),
  image: z.array(z.string().trim().min(1)).default([]),
})

const modelArgumentSchema = z.string().trim().min(1, "model name must not be empty")

const collect = (value: string, previous: string[]): string[] => {
  return [...previous, value]
}

/**
 * Parses CLI arguments into one typed command. Usage errors surface as plain `Error`s so the
 * runner prints them like any other failure.
 *
 * @param argv Raw user arguments, without the node binary and script path.
 * @returns Parsed command; `help` for empty input or explicit help flags.
 */
export const parseCommand = (argv: string[]): GatewayCommand => {
  const [first] = argv
  if (first === undefined || HELP_ARGUMENTS.has(first)) {
    return { name: "help" }
  }

  const captured: { command: GatewayCommand | null } = { command: null }
  const program = new Command()

  program
    .name("ollama-gateway")
    .exitOverride()
    .configureOutput({
      writeOut: () => undefined,
      writeErr: () => undefined,
    })
    .allowExcessArguments(false)

  program.command("models").action(() => {
    captured.command = { name: "models" }
  })

  program
    .command("catalog")
    .argument("[query]", "search text")
    .option("--refresh", "bypass the catalog cache")
    .action((query: string | undefined, options: unknown) => {
      const { refresh } = catalogOptionsSchema.parse(options)
      captured.command = { name: "catalog", query: query?.trim() ?? "", refresh }
    })

  program
    .command("info")
    .argument("<model>", "model name")
    .action((model: string) => {
      captured.command = { name: "info", model: modelArgumentSchema.parse(model) }
    })

  program
    .command("pull")
    .argument("<model>", "model name")
    .action((model: string) => {
      captured.command = { name: "pull", model: modelArgumentSchema.parse(model) }
    })

  program
    .command("delete")
    .argument("<model>", "model name")
    .action((model: string) => {
      captured.command = { name: "delete", model: modelArgumentSchema.parse(model) }
    })

  program
    .command("ask")
    .argument("<prompt...>", "prompt text")
    .option("-m, --model <name>", "preferred model")
    .option("-i, --image <path>", "attach an image (repeatable)", collect, [])
    .action((promptParts: string[], options: unknown) => {
      const { model, image } = askOptionsSchema.parse(options)
      captured.command = {
        name: "ask",
        prompt: promptParts.join(" ").trim(),
        model: model ?? null,
        images: image,
      }
    })

  program.command("health").action(() => {
    captured.command = { name: "health" }
  })

  try {
    program.parse(argv, { from: "user" })
  } catch (error) {
    if (error instanceof CommanderError) {
      if (HELP_ERROR_CODES.has(error.code)) {
        return { name: "help" }
      }

      throw new Error(error.message.replace(/^error:\s*/u, ""))
    }

    if (error instanceof z.ZodError) {
      throw new Error(error.issues.map((issue) => issue.message).join("; "))
    }

    throw error
  }

  if (!captured.command) {
    throw new Error(`Unknown command: ${first}`)
  }

  return captured.command
}
