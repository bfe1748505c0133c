interface PaginationControlsProps {
  label: string;
  prevDisabled: boolean;
  nextDisabled: boolean;
  onPrevious: () => void;
  onNext: () => void;
}

export function PaginationControls({ label, prevDisabled, nextDisabled, onPrevious, onNext }: PaginationControlsProps) {
  return (
    <nav className="pagination" aria-label="Pagination">
      <button type="button" onClick={onPrevious} disabled={prevDisabled}>
        ⬅ Previous
      </button>
      <span className="pagination__label">{label}</span>
      <button type="button" onClick={onNext} disabled={nextDisabled}>
        Next ➡
      </button>
    </nav>
  );
}
