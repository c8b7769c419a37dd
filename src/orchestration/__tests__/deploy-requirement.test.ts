import { TriggerEvent } from '../../types';
import {
  AUX_TITLE_PATTERN,
  evaluateDeployRequirement,
  isDeployRequired,
  RELEASE_TAG_PATTERN,
  REQUIREMENT_RULES,
  RequirementRule,
} from '../deploy-requirement';
import {
  FakeRepositoryHost,
  makeBumpCommit,
  makeCommit,
  makeContext,
  makePullRequestEvent,
} from './helpers';

function releaseEvent(tagName: string): TriggerEvent {
  return { kind: 'release', ref: `refs/tags/${tagName}`, sha: 'r1', release: { tagName } };
}

describe('RELEASE_TAG_PATTERN', () => {
  it.each(['v1', 'v1.2.3', 'v2.0rc1', 'v10.4.0beta2'])('should match %s', (tag) => {
    expect(RELEASE_TAG_PATTERN.test(tag)).toBe(true);
  });

  it.each(['nightly-build', '1.2.3', 'version-1', 'V1.2'])('should not match %s', (tag) => {
    expect(RELEASE_TAG_PATTERN.test(tag)).toBe(false);
  });
});

describe('AUX_TITLE_PATTERN', () => {
  it.each(['Aux: bump linters', '123 Aux: cleanup docs', 'aux: lower case', '  AUX: shouting'])(
    'should match %s',
    (title) => {
      expect(AUX_TITLE_PATTERN.test(title)).toBe(true);
    }
  );

  it.each(['Add retry logic', 'Fix Aux: handling', 'Auxiliary cleanup'])('should not match %s', (title) => {
    expect(AUX_TITLE_PATTERN.test(title)).toBe(false);
  });
});

describe('evaluateDeployRequirement', () => {
  it('should skip releases with a non-version tag', async () => {
    const host = new FakeRepositoryHost();
    const verdict = await evaluateDeployRequirement(makeContext(releaseEvent('nightly-build')), host);

    expect(verdict).toEqual({
      required: false,
      rule: 'release-tag',
      reason: 'Non-version tag "nightly-build", skipping the release.',
    });
    expect(host.calls).toEqual([]);
  });

  it('should deploy releases with a version tag', async () => {
    const verdict = await evaluateDeployRequirement(makeContext(releaseEvent('v1.2.3')), new FakeRepositoryHost());

    expect(verdict.required).toBe(true);
    expect(verdict.rule).toBe('non-pull-request');
  });

  it('should deploy pushes without looking at the commit', async () => {
    const host = new FakeRepositoryHost();
    const context = makeContext({ kind: 'push', ref: 'refs/heads/main', sha: 'b1', headCommit: makeBumpCommit() });

    await expect(isDeployRequired(context, host)).resolves.toBe(true);
    expect(host.calls).toEqual([]);
  });

  it('should deploy manual dispatches', async () => {
    const context = makeContext({ kind: 'workflow_dispatch', ref: 'refs/heads/main', sha: 'w1' });
    await expect(isDeployRequired(context, new FakeRepositoryHost())).resolves.toBe(true);
  });

  it('should skip draft pull requests regardless of title', async () => {
    const host = new FakeRepositoryHost();
    for (const title of ['Add retry logic', 'Aux: docs']) {
      const verdict = await evaluateDeployRequirement(makeContext(makePullRequestEvent({ draft: true, title })), host);
      expect(verdict.required).toBe(false);
      expect(verdict.rule).toBe('draft');
    }
    expect(host.calls).toEqual([]);
  });

  it('should skip auxiliary pull requests', async () => {
    const host = new FakeRepositoryHost();
    const context = makeContext(makePullRequestEvent({ title: '123 Aux: cleanup docs' }));

    await expect(evaluateDeployRequirement(context, host)).resolves.toEqual({
      required: false,
      rule: 'aux-title',
      reason: 'Skip release for a PR prefixed with `Aux:`.',
    });
    expect(host.calls).toEqual([]);
  });

  it('should deploy pull requests with a human commit', async () => {
    const host = new FakeRepositoryHost().addCommit(makeCommit({ sha: 'merge42' }));
    const context = makeContext(makePullRequestEvent({ title: 'Add retry logic' }));

    const verdict = await evaluateDeployRequirement(context, host);
    expect(verdict).toEqual({
      required: true,
      rule: 'human-commit',
      reason: 'Commit merge42 was made by a human, enable the release.',
    });
    expect(host.calls).toEqual(['commit:merge42']);
  });

  it('should skip pull requests whose commit was made by the bump bot', async () => {
    const host = new FakeRepositoryHost().addCommit(makeBumpCommit({ sha: 'merge42' }));
    const context = makeContext(makePullRequestEvent());

    await expect(isDeployRequired(context, host)).resolves.toBe(false);
  });

  it('should deploy a merge PR when one parent is human', async () => {
    const host = new FakeRepositoryHost()
      .addCommit(makeCommit({ sha: 'merge42', parents: ['p1', 'p2'] }))
      .addCommit(makeCommit({ sha: 'p1' }))
      .addCommit(makeBumpCommit({ sha: 'p2' }));
    const context = makeContext(makePullRequestEvent());

    await expect(isDeployRequired(context, host)).resolves.toBe(true);
    expect(host.calls).toEqual(['commit:merge42', 'commit:p1', 'commit:p2']);
  });

  it('should skip a merge PR when every parent is a bump', async () => {
    const host = new FakeRepositoryHost()
      .addCommit(makeCommit({ sha: 'merge42', parents: ['p1', 'p2'] }))
      .addCommit(makeBumpCommit({ sha: 'p1' }))
      .addCommit(makeBumpCommit({ sha: 'p2' }));
    const context = makeContext(makePullRequestEvent());

    await expect(isDeployRequired(context, host)).resolves.toBe(false);
  });

  it('should stop at the first rule that decides', async () => {
    const later = jest.fn(async () => null);
    const rules: RequirementRule[] = [
      { name: 'always-skip', apply: async () => ({ required: false, reason: 'no' }) },
      { name: 'later', apply: later },
    ];

    const verdict = await evaluateDeployRequirement(makeContext(makePullRequestEvent()), new FakeRepositoryHost(), rules);

    expect(verdict.rule).toBe('always-skip');
    expect(later).not.toHaveBeenCalled();
  });

  it('should deploy when no rule decides', async () => {
    const verdict = await evaluateDeployRequirement(makeContext(makePullRequestEvent()), new FakeRepositoryHost(), []);
    expect(verdict).toEqual({ required: true, rule: 'default', reason: 'No rule decided, enable the release.' });
  });

  it('should list the rules in evaluation order', () => {
    expect(REQUIREMENT_RULES.map((rule) => rule.name)).toEqual([
      'release-tag',
      'non-pull-request',
      'draft',
      'aux-title',
      'human-commit',
    ]);
  });
});
