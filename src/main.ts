import { loadEnv } from "./loadEnv.js"
import { InvalidConfigError, loadConfig, type AppConfig } from "./config.js"
import { createDeployer } from "./deployer.js"
import { createApp } from "./server.js"
import { TaskFeed } from "./taskFeed.js"
import { ConsoleTaskReporter, combineReporters } from "./taskReporter.js"

function readConfig(): AppConfig {
    try {
        return loadConfig()
    } catch (error) {
        if (error instanceof InvalidConfigError) {
            console.error(error.message)
            process.exit(1)
        }
        throw error
    }
}

export async function main() {
    loadEnv()
    const config = readConfig()

    if (config.acceptedSecrets.length === 0) {
        console.warn("[server] ACCEPTED_SECRETS is empty: every submission will be refused")
    }

    const feed = new TaskFeed()
    const deployer = createDeployer(config, combineReporters(new ConsoleTaskReporter(), feed))
    const app = createApp({
        allowOrigins: config.allowOrigins,
        acceptedSecrets: config.acceptedSecrets,
        store: deployer.store,
        enqueue: (task) => deployer.orchestrator.enqueue(task),
    })

    const server = app.listen(config.port, () => {
        console.log(`[server] Listening on http://localhost:${config.port}`)
        console.log(`[server] DB path ${config.dbPath}, task logs in ${config.logDir}`)
        console.log(`[server] Up to ${config.maxConcurrentTasks} tasks at a time`)
    })
    feed.attach(server)

    let stopping = false
    const shutdown = async (signal: string) => {
        if (stopping) return
        stopping = true
        console.log(`[server] ${signal} received, waiting for ${deployer.orchestrator.activeTasks} task(s)`)
        server.close()
        await deployer.orchestrator.drain()
        await feed.close()
        deployer.close()
        process.exit(0)
    }

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.on(signal, () => {
            shutdown(signal).catch((error) => {
                console.error("[server] Shutdown failed:", error)
                process.exit(1)
            })
        })
    }
}

main().catch((error) => {
    console.error("Server failed:", error)
    process.exit(1)
})
