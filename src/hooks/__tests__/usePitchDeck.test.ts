import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { toast } from 'sonner';
import { describeRejections, reportStagingOutcome } from '../usePitchDeck';

describe('reportStagingOutcome', () => {
  beforeEach(() => {
    vi.spyOn(toast, 'info').mockImplementation(() => 1);
    vi.spyOn(toast, 'success').mockImplementation(() => 1);
    vi.spyOn(toast, 'warning').mockImplementation(() => 1);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('tells the user to wait when a drop lands mid-operation', () => {
    reportStagingOutcome({ type: 'busy' });

    expect(toast.info).toHaveBeenCalledWith('Please wait for the current operation to finish.');
    expect(toast.warning).not.toHaveBeenCalled();
  });

  it('warns about every skipped file when nothing was staged', () => {
    reportStagingOutcome({
      type: 'rejected',
      rejected: [{ fileName: 'notes.txt', reason: 'Invalid pitch deck file type' }],
    });

    expect(toast.warning).toHaveBeenCalledWith('1 file skipped', {
      description: 'notes.txt: Invalid pitch deck file type',
    });
    expect(toast.success).not.toHaveBeenCalled();
  });

  it('confirms staged files without a warning when none were skipped', () => {
    reportStagingOutcome({ type: 'staged', entries: [], rejected: [] });

    expect(toast.success).toHaveBeenCalledWith('0 files added. Submit when ready.');
    expect(toast.warning).not.toHaveBeenCalled();
  });
});

describe('describeRejections', () => {
  it('puts each file on its own line', () => {
    expect(
      describeRejections([
        { fileName: 'a.txt', reason: 'bad type' },
        { fileName: 'b.pdf', reason: 'too large' },
      ]),
    ).toBe('a.txt: bad type\nb.pdf: too large');
  });
});
