const pad = (value: number) => value.toString().padStart(2, "0");

// Formats elapsed seconds as a fixed-width HH:MM:SS recording clock.
const formatDuration = (seconds?: number) => {
  if (!Number.isFinite(seconds) || seconds === undefined) {
    return "--:--:--";
  }

  const total = Math.max(0, Math.floor(seconds));
  const hrs = Math.floor(total / 3600);
  const mins = Math.floor((total % 3600) / 60);
  const secs = total % 60;

  return `${pad(hrs)}:${pad(mins)}:${pad(secs)}`;
};

export default formatDuration;
