import { Octokit } from "@octokit/rest"
import { RequestError } from "@octokit/request-error"
import { deadlineFetch } from "../deadline.js"
import { RepositoryApiError, describeError } from "../errors.js"
import type {
    BranchHead,
    CreateRepositoryResult,
    PagesBuildStatus,
    RepositoryApi,
    RepositoryInfo,
} from "./repositoryApi.js"

export interface GitHubRepositoryApiOptions {
    token: string
    owner: string
    /** Upper bound for each HTTP request. */
    requestTimeoutMs: number
    /** Injected client for tests; built from token otherwise. */
    octokit?: Octokit
}

function parseRetryAfterMs(headers: Record<string, string | number | undefined>): number | undefined {
    const retryAfter = headers["retry-after"]
    if (retryAfter !== undefined) {
        const seconds = Number(retryAfter)
        if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000
    }
    const reset = headers["x-ratelimit-reset"]
    if (reset !== undefined) {
        const resetAt = Number(reset) * 1000
        if (Number.isFinite(resetAt)) return Math.max(0, resetAt - Date.now())
    }
    return undefined
}

/**
 * Maps Octokit failures onto RepositoryApiError. 429, and 403 with an exhausted quota or a
 * retry-after header, count as rate limiting.
 */
export function toRepositoryApiError(error: unknown, context: string): RepositoryApiError {
    if (error instanceof RepositoryApiError) return error

    if (error instanceof RequestError) {
        const headers: Record<string, string | number | undefined> = error.response?.headers ?? {}
        const rateLimited =
            error.status === 429 ||
            (error.status === 403 &&
                (headers["x-ratelimit-remaining"] === "0" || headers["retry-after"] !== undefined))
        return new RepositoryApiError(
            `GitHub API error (${error.status}): ${context}`,
            error.status,
            rateLimited,
            rateLimited ? parseRetryAfterMs(headers) : undefined,
            { cause: error },
        )
    }

    return new RepositoryApiError(`Network error: ${context}: ${describeError(error)}`, null, false, undefined, {
        cause: error,
    })
}

function hasStatus(error: unknown, ...statuses: number[]): boolean {
    return error instanceof RequestError && statuses.includes(error.status)
}

function toPagesBuildStatus(status: string | null | undefined): PagesBuildStatus {
    switch (status) {
        case "built":
        case "building":
        case "queued":
        case "errored":
            return status
        default:
            return null
    }
}

/**
 * RepositoryApi over the GitHub REST API. Commits go through the Git Data API
 * (blob → tree → commit → ref) so a whole file set lands in one commit.
 */
export class GitHubRepositoryApi implements RepositoryApi {
    private readonly octokit: Octokit
    private readonly owner: string

    constructor(options: GitHubRepositoryApiOptions) {
        this.owner = options.owner
        this.octokit =
            options.octokit ??
            new Octokit({
                auth: options.token,
                userAgent: "llm-app-deployer",
                request: { fetch: deadlineFetch(options.requestTimeoutMs) },
            })
    }

    private async call<T>(context: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn()
        } catch (error) {
            throw toRepositoryApiError(error, context)
        }
    }

    async getRepository(name: string): Promise<RepositoryInfo | null> {
        try {
            const { data } = await this.octokit.rest.repos.get({ owner: this.owner, repo: name })
            return {
                name: data.name,
                htmlUrl: data.html_url,
                description: data.description,
                defaultBranch: data.default_branch,
            }
        } catch (error) {
            if (hasStatus(error, 404)) return null
            throw toRepositoryApiError(error, `get repository ${name}`)
        }
    }

    async createRepository(params: { name: string; description: string }): Promise<CreateRepositoryResult> {
        try {
            const { data } = await this.octokit.rest.repos.createForAuthenticatedUser({
                name: params.name,
                description: params.description,
                private: false,
                auto_init: true,
            })
            return {
                status: "created",
                repository: {
                    name: data.name,
                    htmlUrl: data.html_url,
                    description: data.description,
                    defaultBranch: data.default_branch,
                },
            }
        } catch (error) {
            // 422 is also used for other validation problems, so confirm the name is taken.
            if (hasStatus(error, 422) && (await this.getRepository(params.name))) {
                return { status: "exists" }
            }
            throw toRepositoryApiError(error, `create repository ${params.name}`)
        }
    }

    async getBranchHead(repo: string, branch: string): Promise<BranchHead | null> {
        let commitSha: string
        try {
            const { data } = await this.octokit.rest.git.getRef({
                owner: this.owner,
                repo,
                ref: `heads/${branch}`,
            })
            commitSha = data.object.sha
        } catch (error) {
            // 409: repository has no commits yet
            if (hasStatus(error, 404, 409)) return null
            throw toRepositoryApiError(error, `get ref heads/${branch} of ${repo}`)
        }

        const { data: commit } = await this.call(`get commit ${commitSha} of ${repo}`, () =>
            this.octokit.rest.git.getCommit({ owner: this.owner, repo, commit_sha: commitSha }),
        )
        return { commitSha, treeSha: commit.tree.sha }
    }

    async createBlob(repo: string, params: { content: string; encoding: "utf-8" | "base64" }): Promise<string> {
        const { data } = await this.call(`create blob in ${repo}`, () =>
            this.octokit.rest.git.createBlob({
                owner: this.owner,
                repo,
                content: params.content,
                encoding: params.encoding,
            }),
        )
        return data.sha
    }

    async createTree(repo: string, entries: Array<{ path: string; blobSha: string }>): Promise<string> {
        const { data } = await this.call(`create tree in ${repo}`, () =>
            this.octokit.rest.git.createTree({
                owner: this.owner,
                repo,
                tree: entries.map((entry) => ({
                    path: entry.path,
                    mode: "100644" as const,
                    type: "blob" as const,
                    sha: entry.blobSha,
                })),
            }),
        )
        return data.sha
    }

    async createCommit(
        repo: string,
        params: { message: string; treeSha: string; parents: string[] },
    ): Promise<string> {
        const { data } = await this.call(`create commit in ${repo}`, () =>
            this.octokit.rest.git.createCommit({
                owner: this.owner,
                repo,
                message: params.message,
                tree: params.treeSha,
                parents: params.parents,
            }),
        )
        return data.sha
    }

    async updateBranch(repo: string, branch: string, commitSha: string): Promise<"updated" | "conflict"> {
        try {
            await this.octokit.rest.git.updateRef({
                owner: this.owner,
                repo,
                ref: `heads/${branch}`,
                sha: commitSha,
                force: false,
            })
            return "updated"
        } catch (error) {
            // 422: not a fast-forward, the branch moved since it was read
            if (hasStatus(error, 409, 422)) return "conflict"
            throw toRepositoryApiError(error, `update heads/${branch} of ${repo}`)
        }
    }

    async createBranch(repo: string, branch: string, commitSha: string): Promise<"created" | "conflict"> {
        try {
            await this.octokit.rest.git.createRef({
                owner: this.owner,
                repo,
                ref: `refs/heads/${branch}`,
                sha: commitSha,
            })
            return "created"
        } catch (error) {
            if (hasStatus(error, 409, 422)) return "conflict"
            throw toRepositoryApiError(error, `create heads/${branch} in ${repo}`)
        }
    }

    async enablePages(repo: string, source: { branch: string; path: "/" }): Promise<"enabled" | "already-enabled"> {
        try {
            await this.octokit.rest.repos.createPagesSite({ owner: this.owner, repo, source })
            return "enabled"
        } catch (error) {
            if (hasStatus(error, 409)) return "already-enabled"
            throw toRepositoryApiError(error, `enable pages for ${repo}`)
        }
    }

    async getPagesStatus(repo: string): Promise<PagesBuildStatus> {
        try {
            const { data } = await this.octokit.rest.repos.getPages({ owner: this.owner, repo })
            return toPagesBuildStatus(data.status)
        } catch (error) {
            if (hasStatus(error, 404)) return null
            throw toRepositoryApiError(error, `get pages status for ${repo}`)
        }
    }
}
