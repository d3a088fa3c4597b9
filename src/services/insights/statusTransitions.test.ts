import { describe, it, expect } from 'vitest';
import { InvalidTransitionError, ValidationError } from '../../utils/errors';
import { assertTransition, canTransition, parseInsightStatus } from './statusTransitions';

describe('insight status transitions', () => {
  it('lets active insights be dismissed or resolved', () => {
    expect(canTransition('Active', 'Dismissed')).toBe(true);
    expect(canTransition('Active', 'Resolved')).toBe(true);
  });

  it('treats dismissed and resolved as final', () => {
    expect(canTransition('Dismissed', 'Resolved')).toBe(false);
    expect(canTransition('Resolved', 'Active')).toBe(false);
    expect(canTransition('Active', 'Active')).toBe(false);
  });

  it('raises a 409 for a rejected transition', () => {
    expect(() => assertTransition('Dismissed', 'Resolved')).toThrow(InvalidTransitionError);
    expect(() => assertTransition('Dismissed', 'Resolved')).toThrow(
      'Cannot change status from Dismissed to Resolved'
    );
    expect(new InvalidTransitionError('Dismissed', 'Resolved').statusCode).toBe(409);
  });

  it('parses only known statuses', () => {
    expect(parseInsightStatus('Resolved')).toBe('Resolved');
    expect(() => parseInsightStatus('Archived')).toThrow(ValidationError);
    expect(() => parseInsightStatus(undefined)).toThrow('status must be one of Active, Dismissed, Resolved');
  });
});
