import { deriveRepositoryName, type Deployment, type PagesStatus, type Task } from "../taskTypes.js"
import type { GeneratedFileSet } from "../generator/fileSet.js"
import { PublishError, RepositoryApiError, describeError } from "../errors.js"
import type { TaskLogger } from "../taskLog.js"
import type { PagesBuildStatus, RepositoryApi, RepositoryInfo } from "./repositoryApi.js"

export interface RepositoryPublisherOptions {
    api: RepositoryApi
    /** Account that owns the generated repositories. */
    owner: string
    branch: string
    repoPrefix: string
}

export interface PublishContext {
    logger?: TaskLogger
}

export function repositoryMarker(taskId: string): string {
    return `Generated for task ${taskId}`
}

export function buildPagesUrl(owner: string, repositoryName: string): string {
    return `https://${owner.toLowerCase()}.github.io/${repositoryName}/`
}

function toPagesStatus(status: PagesBuildStatus): PagesStatus {
    if (status === "built") return "live"
    if (status === "errored") return "unknown"
    return "pending"
}

function toPublishError(error: unknown, step: string): PublishError {
    if (error instanceof PublishError) return error
    if (error instanceof RepositoryApiError && error.rateLimited) {
        return new PublishError("rate-limited", `${step}: ${error.message}`, {
            cause: error,
            retryAfterMs: error.retryAfterMs,
        })
    }
    return new PublishError("upstream-error", `${step}: ${describeError(error)}`, { cause: error })
}

/**
 * Publishes a file set for a task: ensure repository → one atomic commit → enable Pages.
 * Every step is safe to repeat, so calling publish again for the same task converges on the
 * same repository and tree.
 */
export class RepositoryPublisher {
    private readonly api: RepositoryApi
    private readonly owner: string
    private readonly branch: string
    private readonly repoPrefix: string

    constructor(options: RepositoryPublisherOptions) {
        this.api = options.api
        this.owner = options.owner
        this.branch = options.branch
        this.repoPrefix = options.repoPrefix
    }

    async publish(task: Task, files: GeneratedFileSet, context: PublishContext = {}): Promise<Deployment> {
        const repositoryName = deriveRepositoryName(task, this.repoPrefix)
        const logger = context.logger

        const repository = await this.step("ensure repository", () => this.ensureRepository(task, repositoryName, logger))
        const commitSha = await this.step("commit files", () => this.commitFiles(task, repositoryName, files, logger))
        const pagesStatus = await this.enableHosting(repositoryName, logger)

        return {
            repositoryName,
            repositoryUrl: repository.htmlUrl,
            pagesUrl: buildPagesUrl(this.owner, repositoryName),
            commitSha,
            pagesStatus,
        }
    }

    private async step<T>(label: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn()
        } catch (error) {
            throw toPublishError(error, label)
        }
    }

    private async ensureRepository(task: Task, name: string, logger?: TaskLogger): Promise<RepositoryInfo> {
        const marker = repositoryMarker(task.id)
        let repository = await this.api.getRepository(name)

        if (!repository) {
            const created = await this.api.createRepository({
                name,
                description: `${marker} (${task.task}, round ${task.round})`,
            })
            if (created.status === "created") {
                logger?.info(`[publisher] Created repository ${name}`)
                repository = created.repository
            } else {
                // Another attempt for the same task created it first.
                repository = await this.api.getRepository(name)
                if (!repository) {
                    throw new PublishError("upstream-error", `Repository ${name} reported as existing but cannot be read`)
                }
            }
        } else {
            logger?.info(`[publisher] Repository ${name} already exists, reusing it`)
        }

        if (!(repository.description ?? "").includes(marker)) {
            throw new PublishError(
                "naming-conflict",
                `Repository ${this.owner}/${name} exists but was not created for task ${task.id}`,
            )
        }
        return repository
    }

    private async commitFiles(task: Task, repo: string, files: GeneratedFileSet, logger?: TaskLogger): Promise<string> {
        const head = await this.api.getBranchHead(repo, this.branch)

        // Blobs, trees and commits stay unreachable until the ref moves, so an interrupted
        // attempt leaves the branch exactly as it was.
        const entries: Array<{ path: string; blobSha: string }> = []
        for (const file of files.files) {
            const blobSha = await this.api.createBlob(repo, { content: file.content, encoding: file.encoding })
            entries.push({ path: file.path, blobSha })
        }
        const treeSha = await this.api.createTree(repo, entries)

        if (head && head.treeSha === treeSha) {
            logger?.info(`[publisher] ${repo}@${this.branch} already holds this file set (${head.commitSha.slice(0, 7)})`)
            return head.commitSha
        }

        const commitSha = await this.api.createCommit(repo, {
            message: `Deploy ${files.size} files for task ${task.task} (round ${task.round})`,
            treeSha,
            parents: head ? [head.commitSha] : [],
        })

        const moved = head
            ? await this.api.updateBranch(repo, this.branch, commitSha)
            : await this.api.createBranch(repo, this.branch, commitSha)

        if (moved === "conflict") {
            const current = await this.api.getBranchHead(repo, this.branch)
            if (current && current.treeSha === treeSha) {
                logger?.info(`[publisher] ${repo}@${this.branch} moved concurrently to the same tree, converged`)
                return current.commitSha
            }
            throw new PublishError(
                "partial-commit",
                `Branch ${this.branch} of ${repo} moved to a different tree; commit ${commitSha.slice(0, 7)} not applied`,
            )
        }

        logger?.info(`[publisher] Committed ${files.size} files to ${repo}@${this.branch} (${commitSha.slice(0, 7)})`)
        return commitSha
    }

    /**
     * Pages activation is asynchronous on the host. Only rate limiting fails the publish; any
     * other problem leaves the deployment valid with an unknown hosting status.
     */
    private async enableHosting(repo: string, logger?: TaskLogger): Promise<PagesStatus> {
        try {
            const enabled = await this.api.enablePages(repo, { branch: this.branch, path: "/" })
            logger?.info(
                enabled === "enabled"
                    ? `[publisher] Enabled Pages for ${repo}`
                    : `[publisher] Pages already enabled for ${repo}`,
            )
            const status = await this.api.getPagesStatus(repo)
            return toPagesStatus(status)
        } catch (error) {
            if (error instanceof RepositoryApiError && error.rateLimited) {
                throw toPublishError(error, "enable pages")
            }
            logger?.warn(`[publisher] Could not enable or read Pages for ${repo}: ${describeError(error)}`)
            return "unknown"
        }
    }
}
