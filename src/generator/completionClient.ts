import { Agent, OpenAIProvider, Runner } from "@openai/agents"

export interface CompletionRequest {
    instructions: string
    prompt: string
    signal: AbortSignal
}

/**
 * Single request/response call to a language model. The generator only depends on this port.
 */
export interface CompletionClient {
    complete(request: CompletionRequest): Promise<string>
}

export interface AgentsCompletionOptions {
    apiKey: string
    model: string
}

export function createAgentsCompletionClient(options: AgentsCompletionOptions): CompletionClient {
    // Explicit provider so the key comes from AppConfig rather than process.env.
    const runner = new Runner({ modelProvider: new OpenAIProvider({ apiKey: options.apiKey }) })

    return {
        async complete({ instructions, prompt, signal }) {
            const agent = new Agent({
                name: "App Generator",
                model: options.model,
                instructions,
            })
            const result = await runner.run(agent, prompt, { maxTurns: 1, signal })
            return result.finalOutput ?? ""
        },
    }
}
