interface EmptyStateProps {
  message?: string;
}

export function EmptyState({ message = 'No results for this query' }: EmptyStateProps) {
  return (
    <div className="empty-state" role="status">
      <div className="empty-content">
        <span className="empty-icon">🔍</span>
        <h3>{message}</h3>
      </div>
    </div>
  );
}
