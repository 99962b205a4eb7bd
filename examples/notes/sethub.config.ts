import { defineConfig } from 'sethub/config'

export default defineConfig({
  projectName: 'Notes',
  db: { drivername: 'sqlite' },
  engine: { echo: process.env.DB_ECHO === 'true' },
  session: { commitOnExit: true },
})
