import type { FileEncoding } from "../generator/fileSet.js"

export interface RepositoryInfo {
    name: string
    htmlUrl: string
    description: string | null
    defaultBranch: string
}

export interface BranchHead {
    commitSha: string
    treeSha: string
}

export type CreateRepositoryResult =
    | { status: "created"; repository: RepositoryInfo }
    | { status: "exists" }

/** Build status reported by the hosting platform; null when no build has been recorded yet. */
export type PagesBuildStatus = "built" | "building" | "queued" | "errored" | null

/**
 * Operations the publisher needs from the repository host, all scoped to one owner account.
 * Missing resources come back as null or a status value; everything else that goes wrong is
 * thrown as a RepositoryApiError.
 */
export interface RepositoryApi {
    getRepository(name: string): Promise<RepositoryInfo | null>
    createRepository(params: { name: string; description: string }): Promise<CreateRepositoryResult>
    getBranchHead(repo: string, branch: string): Promise<BranchHead | null>
    createBlob(repo: string, params: { content: string; encoding: FileEncoding }): Promise<string>
    createTree(repo: string, entries: Array<{ path: string; blobSha: string }>): Promise<string>
    createCommit(repo: string, params: { message: string; treeSha: string; parents: string[] }): Promise<string>
    /** Fast-forward only; "conflict" when the branch is no longer at the commit's parent. */
    updateBranch(repo: string, branch: string, commitSha: string): Promise<"updated" | "conflict">
    createBranch(repo: string, branch: string, commitSha: string): Promise<"created" | "conflict">
    enablePages(repo: string, source: { branch: string; path: "/" }): Promise<"enabled" | "already-enabled">
    getPagesStatus(repo: string): Promise<PagesBuildStatus>
}
