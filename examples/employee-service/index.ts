import { randomBytes } from "node:crypto";
import { createEmployeeAuthService } from "../../src/bootstrap.js";
import { loadConfig } from "../../src/config.js";
import { InMemoryEmployeeRepository } from "../../src/employees/memoryRepository.js";
import { toAuthError } from "../../src/errors/error.js";

// -----------------------------
// Config
// Real deployments set JWT_SIGNING_KEY in the environment (or .env).
// The demo generates a throwaway key when none is set.
// -----------------------------
const config = loadConfig({
  JWT_SIGNING_KEY: randomBytes(32).toString("base64"),
  ...process.env,
});

const employees = new InMemoryEmployeeRepository();
const { employeeManagement, tokenIssuer, logger } = createEmployeeAuthService(
  config,
  { employees },
);

async function main() {
  // Bootstrap path: the first admin is created without a manager token.
  await employeeManagement.registerAdmins([
    {
      username: "admin",
      password: "change-me",
      email: "admin@example.test",
      roles: [{ roleName: "ADMIN" }],
    },
  ]);

  const admin = await employeeManagement.login({
    username: "admin",
    password: "change-me",
  });
  const bearer = `Bearer ${admin.token}`;

  const [operator] = await employeeManagement.registerEmployees(bearer, [
    {
      username: "operator-1",
      password: "change-me-too",
      email: "operator-1@example.test",
      roles: [{ roleName: "OPERATOR" }, { roleName: "LEADER" }],
    },
  ]);

  const session = await employeeManagement.login({
    username: "operator-1",
    password: "change-me-too",
  });
  const verified = await tokenIssuer.verify(session.token);
  logger.info(
    {
      username: verified.username,
      authorities: verified.authorities,
      expiresAt: verified.expiresAt.toISOString(),
    },
    "operator logged in",
  );

  await employeeManagement.updateEmployee(bearer, operator.id, {
    roles: [{ roleName: "OPERATOR" }],
  });
  await employeeManagement.deleteEmployee(bearer, operator.id);

  try {
    await employeeManagement.login({
      username: "operator-1",
      password: "change-me-too",
    });
  } catch (e) {
    logger.info({ error: toAuthError(e) }, "deleted employee cannot log in");
  }
}

main().catch((e) => {
  logger.fatal({ err: e }, "example failed");
  process.exit(1);
});
