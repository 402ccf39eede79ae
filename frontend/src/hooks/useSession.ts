import { useEffect, useReducer, useState } from 'react';
import { AnnotationSession, type SessionOptions } from '../lib/session';

/**
 * Keeps one AnnotationSession for the component's lifetime and re-renders
 * whenever it reports a change.
 */
export const useSession = (options: SessionOptions) => {
  const [session] = useState(() => new AnnotationSession(options));
  const [revision, bump] = useReducer((n: number) => n + 1, 0);

  useEffect(() => {
    const unsubscribe = session.subscribe(bump);
    return () => {
      unsubscribe();
    };
  }, [session]);

  useEffect(() => () => session.dispose(), [session]);

  return { session, revision };
};
