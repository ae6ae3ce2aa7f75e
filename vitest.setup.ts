// Config loading warns on the failures tests provoke on purpose; keep them
// out of the test output unless LOG_LEVEL asks for them.
process.env.LOG_LEVEL ??= "fatal";
