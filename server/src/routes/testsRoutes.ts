// server/src/routes/testsRoutes.ts
import { Router } from "express";
import { getTest, listTests, type TestsLocation } from "../controllers/testsController";

export default function testsRoutes(loc: TestsLocation) {
  const router = Router();

  router.get("/", listTests(loc));
  router.get("/:filename", getTest(loc));

  return router;
}
