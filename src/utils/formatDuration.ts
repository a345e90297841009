// Formats seconds into a compact "1h 2m 3s" label.
const formatDuration = (seconds?: number) => {
  if (seconds === undefined || !Number.isFinite(seconds) || seconds <= 0) {
    return "0s";
  }

  const total = Math.floor(seconds);
  const hrs = Math.floor(total / 3600);
  const mins = Math.floor((total % 3600) / 60);
  const secs = total % 60;

  const parts: string[] = [];
  if (hrs > 0) {
    parts.push(`${hrs}h`);
  }
  if (mins > 0) {
    parts.push(`${mins}m`);
  }
  if (secs > 0 || parts.length === 0) {
    parts.push(`${secs}s`);
  }

  return parts.join(" ");
};

export default formatDuration;
