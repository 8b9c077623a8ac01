function timestamp(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

export function log(message: string, source = "SCRAPER") {
  console.log(`${timestamp()} [${source}] ${message}`);
}

export function warn(message: string, source = "SCRAPER") {
  console.warn(`${timestamp()} [${source}] ⚠️ ${message}`);
}
