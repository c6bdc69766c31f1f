import { useEffect, useRef, type ReactNode } from 'react';

type SwipePagerProps = {
  activeIndex: number;
  onIndexChange: (index: number) => void;
  pages: Array<{
    id: string;
    node: ReactNode;
  }>;
};

export function SwipePager({ activeIndex, onIndexChange, pages }: SwipePagerProps) {
  const containerRef = useRef<HTMLDivElement | null>(null);
  const isProgrammaticScrollRef = useRef(false);
  const fromScrollRef = useRef(false);
  const releaseProgrammaticRef = useRef<number | null>(null);

  useEffect(() => {
    if (fromScrollRef.current) {
      fromScrollRef.current = false;
      return;
    }

    const node = containerRef.current;
    const pageWidth = node?.clientWidth ?? 0;
    if (!node || !pageWidth) {
      return;
    }

    const targetLeft = activeIndex * pageWidth;
    if (Math.abs(node.scrollLeft - targetLeft) <= 1) {
      return;
    }

    isProgrammaticScrollRef.current = true;
    if (releaseProgrammaticRef.current !== null) {
      window.cancelAnimationFrame(releaseProgrammaticRef.current);
    }
    node.scrollTo({ left: targetLeft, behavior: 'smooth' });
    releaseProgrammaticRef.current = window.requestAnimationFrame(() => {
      isProgrammaticScrollRef.current = false;
      releaseProgrammaticRef.current = null;
    });
  }, [activeIndex]);

  useEffect(() => {
    const node = containerRef.current;
    if (!node) {
      return;
    }

    const onScroll = () => {
      const pageWidth = node.clientWidth;
      if (isProgrammaticScrollRef.current || !pageWidth) {
        return;
      }

      const next = Math.round(node.scrollLeft / pageWidth);
      if (next !== activeIndex && next >= 0 && next < pages.length) {
        fromScrollRef.current = true;
        onIndexChange(next);
      }
    };

    node.addEventListener('scroll', onScroll, { passive: true });
    return () => {
      node.removeEventListener('scroll', onScroll);
      if (releaseProgrammaticRef.current !== null) {
        window.cancelAnimationFrame(releaseProgrammaticRef.current);
        releaseProgrammaticRef.current = null;
      }
    };
  }, [activeIndex, onIndexChange, pages.length]);

  return (
    <div
      ref={containerRef}
      className="h-full w-full snap-x snap-mandatory overflow-x-auto overflow-y-hidden [scrollbar-width:none]"
    >
      <div className="flex h-full w-full">
        {pages.map((page, pageIndex) => (
          <section
            key={page.id}
            aria-label={`Page ${pageIndex + 1} of ${pages.length}`}
            aria-hidden={pageIndex !== activeIndex}
            className="h-full w-full shrink-0 snap-center overflow-hidden"
          >
            {page.node}
          </section>
        ))}
      </div>
    </div>
  );
}
