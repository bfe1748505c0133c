export function LoadingState() {
  return (
    <div className="loading">
      <div className="spinner">⏳</div>
      <p>Searching...</p>
    </div>
  );
}
