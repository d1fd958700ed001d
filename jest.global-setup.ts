// Tests run in a zone with daylight saving time so timestamp handling
// meets a spring-forward gap whatever the host is set to
export default function globalSetup(): void {
  process.env.TZ = 'Europe/London';
}
