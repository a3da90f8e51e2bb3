import type { AppConfig } from "./config.js"
import { TaskStore } from "./db/taskStore.js"
import { CodeGenerator } from "./generator/codeGenerator.js"
import { createAgentsCompletionClient } from "./generator/completionClient.js"
import { Notifier } from "./notifier/notifier.js"
import { GitHubRepositoryApi } from "./publisher/githubRepositoryApi.js"
import { RepositoryPublisher } from "./publisher/repositoryPublisher.js"
import { TaskOrchestrator } from "./taskOrchestrator.js"
import type { TaskReporter } from "./taskReporter.js"

export interface Deployer {
    generator: CodeGenerator
    orchestrator: TaskOrchestrator
    store: TaskStore
    close(): void
}

/** Wires the production adapters (OpenAI, GitHub, fetch, SQLite) from configuration. */
export function createDeployer(config: AppConfig, reporter: TaskReporter): Deployer {
    const generator = new CodeGenerator({
        completion: createAgentsCompletionClient(config.openai),
        timeoutMs: config.timeouts.generationMs,
    })
    const publisher = new RepositoryPublisher({
        api: new GitHubRepositoryApi({
            token: config.github.token,
            owner: config.github.owner,
            requestTimeoutMs: config.timeouts.githubMs,
        }),
        owner: config.github.owner,
        branch: config.github.branch,
        repoPrefix: config.github.repoPrefix,
    })
    const notifier = new Notifier({ policy: config.retry.notify, timeoutMs: config.timeouts.notifyMs })
    const store = new TaskStore(config.dbPath)

    const orchestrator = new TaskOrchestrator({
        generator,
        publisher,
        notifier,
        store,
        reporter,
        generationPolicy: config.retry.generation,
        publishPolicy: config.retry.publish,
        maxConcurrentTasks: config.maxConcurrentTasks,
        logDir: config.logDir,
    })

    return { generator, orchestrator, store, close: () => store.close() }
}
