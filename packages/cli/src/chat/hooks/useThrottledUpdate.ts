import { useRef, useCallback, useEffect } from 'react';
import type { ChatMessage } from '../types.js';

export type MessageUpdate = Partial<Omit<ChatMessage, 'id'>>;

interface ThrottledUpdateOptions {
  intervalMs?: number;
}

interface UseThrottledUpdateReturn {
  throttledUpdate: (id: string, update: MessageUpdate) => void;
  flush: () => void;
}

/** Merges an update into the pending buffer; later keys win. */
export function bufferUpdate(pending: Map<string, MessageUpdate>, id: string, update: MessageUpdate): void {
  const existing = pending.get(id);
  pending.set(id, existing ? { ...existing, ...update } : { ...update });
}

/**
 * Batches streaming updates and applies them at a fixed interval (100 ms by
 * default), so a fast token stream does not re-render the terminal on
 * every delta.
 */
export function useThrottledUpdate(
  updateMessage: (id: string, update: MessageUpdate) => void,
  options: ThrottledUpdateOptions = {},
): UseThrottledUpdateReturn {
  const intervalMs = options.intervalMs ?? 100;
  const pendingRef = useRef<Map<string, MessageUpdate>>(new Map());

  const updateRef = useRef(updateMessage);
  updateRef.current = updateMessage;

  const doFlush = useCallback(() => {
    const pending = pendingRef.current;
    if (pending.size === 0) return;
    for (const [id, update] of pending) {
      updateRef.current(id, update);
    }
    pending.clear();
  }, []);

  useEffect(() => {
    const timer = setInterval(doFlush, intervalMs);
    return () => {
      clearInterval(timer);
      doFlush();
    };
  }, [doFlush, intervalMs]);

  const throttledUpdate = useCallback((id: string, update: MessageUpdate) => {
    bufferUpdate(pendingRef.current, id, update);
  }, []);

  return { throttledUpdate, flush: doFlush };
}
