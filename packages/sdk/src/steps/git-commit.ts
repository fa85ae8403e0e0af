import { BaseStep } from '../step';

// Identity GitHub uses for commits made by Actions workflows.
// https://github.com/orgs/community/discussions/26560#discussioncomment-3252339
const BOT_NAME = 'github-actions[bot]';
const BOT_EMAIL = '41898282+github-actions[bot]@users.noreply.github.com';

export interface GitCommitOptions {
    message: string;
    /** Single-letter `git commit` flags, e.g. `['a']`. `m` is always supplied. */
    flags?: string[];
    author?: string;
    userName?: string;
    userEmail?: string;
    pushChanges?: boolean;
}

export interface GitCommitOutput {
    commitSha?: string;
    hadChanges: boolean;
}

/**
 * Commits pending changes to the pull request's head branch and pushes them.
 * Outside CI both the commit and the push are dry runs.
 */
export class GitCommit extends BaseStep<GitCommitOutput> {
    private readonly flags: string[];

    constructor(private readonly options: GitCommitOptions) {
        super('Git Commit');
        this.flags = (options.flags ?? []).filter((flag) => flag !== 'm');
    }

    async run(): Promise<GitCommitOutput> {
        const { shell, environment } = this.context;
        const dryRun = this.context.platform === undefined;

        const status = await shell.run('git', ['status', '--short'], { quiet: true });
        if (status.trim() === '') {
            this.logger.info('No changes to commit.');
            return { hadChanges: false };
        }

        const branch = environment.require('GITHUB_HEAD_REF');
        await shell.run('git', ['fetch', '--depth=1']);
        await shell.run('git', ['checkout', branch]);

        const actor = environment.require('GITHUB_ACTOR');
        const userName = this.options.userName ?? BOT_NAME;
        const userEmail = this.options.userEmail ?? BOT_EMAIL;
        const author = this.options.author ?? `${actor} <${actor}@users.noreply.github.com>`;

        const commit = [
            '-c', `user.name=${userName}`,
            '-c', `user.email=${userEmail}`,
            'commit',
            '-m', this.options.message,
            `--author=${author}`,
        ];
        if (this.flags.length > 0) commit.push(`-${this.flags.join('')}`);
        if (dryRun) commit.push('--dry-run');
        await shell.run('git', commit);

        const commitSha = await shell.run('git', ['rev-parse', 'HEAD'], { quiet: true });

        if (this.options.pushChanges ?? true) {
            const push = ['push', '--set-upstream', 'origin', `HEAD:${branch}`, '--atomic'];
            if (dryRun) push.push('--dry-run');
            await shell.run('git', push);
        }

        return { commitSha, hadChanges: true };
    }
}
