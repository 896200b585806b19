// @vitest-environment jsdom
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { EntryForm } from '../src/components/EntryForm';
import type { TimeOfDay } from '../src/lib/types';

type Payload = { name: string; start: TimeOfDay; end: TimeOfDay };

function inputByLabel(label: string): HTMLInputElement {
  const element = screen.getByLabelText(label);
  if (!(element instanceof HTMLInputElement)) throw new Error(`${label} is not an input`);
  return element;
}

function submit(): void {
  fireEvent.submit(screen.getByRole('form', { name: 'Record activity' }));
}

describe('EntryForm', () => {
  afterEach(() => {
    cleanup();
  });

  it('submits the raw name with the default 12:00-13:00 range', () => {
    const onSubmit = vi.fn((_payload: Payload) => true);
    render(<EntryForm onSubmit={onSubmit} onInvalidTime={vi.fn()} />);
    fireEvent.change(inputByLabel('Activity'), { target: { value: ' lunch ' } });
    submit();
    expect(onSubmit).toHaveBeenCalledWith({
      name: ' lunch ',
      start: { hour: 12, minute: 0 },
      end: { hour: 13, minute: 0 }
    });
    expect(inputByLabel('Activity').value).toBe('');
  });

  it('keeps the name when the submit is refused', () => {
    const onSubmit = vi.fn((_payload: Payload) => false);
    render(<EntryForm onSubmit={onSubmit} onInvalidTime={vi.fn()} />);
    fireEvent.change(inputByLabel('Activity'), { target: { value: 'work' } });
    submit();
    expect(onSubmit).toHaveBeenCalledTimes(1);
    expect(inputByLabel('Activity').value).toBe('work');
  });

  it('reports an empty time field instead of submitting', () => {
    const onSubmit = vi.fn((_payload: Payload) => true);
    const onInvalidTime = vi.fn();
    render(<EntryForm onSubmit={onSubmit} onInvalidTime={onInvalidTime} />);
    fireEvent.change(inputByLabel('End'), { target: { value: '' } });
    submit();
    expect(onInvalidTime).toHaveBeenCalledTimes(1);
    expect(onSubmit).not.toHaveBeenCalled();
  });

  it('renders the error and notice it is given', () => {
    render(
      <EntryForm error="Please enter an activity name." notice={'Added "x"'} onSubmit={vi.fn()} onInvalidTime={vi.fn()} />
    );
    expect(screen.getByText('Please enter an activity name.')).toBeTruthy();
    expect(screen.getByText('Added "x"')).toBeTruthy();
  });
});
