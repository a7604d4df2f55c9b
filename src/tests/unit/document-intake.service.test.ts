import assert from "node:assert/strict";
import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { test } from "node:test";
import { DocumentIntakeService } from "../../documents/document-intake.service";
import { DocumentStatus, UploadedFile } from "../../shared/types/domain.types";
import { ServiceError } from "../../shared/errors";
import { FileStorageService, StorageFolder, StoredFile } from "../../storage/file-storage.service";
import {
  buildCandidate,
  buildRepositories,
  noopLogger,
  steppingClock,
  withTempDir,
} from "../support/fakes";

const NOW = "2026-10-20T08:30:15.000Z";

function upload(originalName: string, content = "file-bytes"): UploadedFile {
  const buffer = Buffer.from(content);
  return { originalName, mimeType: "application/octet-stream", buffer, size: buffer.length };
}

class FlakyFileStorage extends FileStorageService {
  saves = 0;
  failOnSave = 2;

  async save(folder: StorageFolder, fileName: string, buffer: Buffer): Promise<StoredFile> {
    this.saves += 1;
    if (this.saves === this.failOnSave) {
      throw new ServiceError("storage_failure", "Failed to store uploaded file");
    }
    return super.save(folder, fileName, buffer);
  }
}

async function withHarness(
  documentStatus: DocumentStatus,
  run: (harness: ReturnType<typeof buildRepositories> & { service: DocumentIntakeService; dir: string }) => Promise<void>,
  buildStorage: (dir: string) => FileStorageService = (dir) => new FileStorageService(dir, noopLogger),
): Promise<void> {
  await withTempDir(async (dir) => {
    const repositories = buildRepositories();
    await repositories.candidatesRepository.create(buildCandidate({ documentStatus }));
    const service = new DocumentIntakeService(
      repositories.candidatesRepository,
      repositories.documentsRepository,
      repositories.agentLogsRepository,
      buildStorage(dir),
      noopLogger,
      steppingClock(NOW),
    );
    await run({ ...repositories, service, dir });
  });
}

test("stores both documents and marks the candidate SUBMITTED", async () => {
  await withHarness("REQUESTED", async ({ service, dir, candidatesRepository, documentsRepository, agentLogsRepository }) => {
    const result = await service.submitDocuments("c-1", {
      pan: upload("pan scan.PNG", "pan-bytes"),
      aadhaar: upload("aadhaar.pdf", "aadhaar-bytes"),
    });

    assert.deepEqual(result, {
      candidateId: "c-1",
      documents: {
        pan: "c-1_PAN_20261020_083015.png",
        aadhaar: "c-1_AADHAAR_20261020_083015.pdf",
      },
    });
    assert.equal(
      await readFile(path.join(dir, "documents", "c-1_PAN_20261020_083015.png"), "utf8"),
      "pan-bytes",
    );

    const documents = await documentsRepository.listByCandidate("c-1");
    assert.deepEqual(
      documents.map((document) => [document.documentType, document.filePath, document.verificationStatus]),
      [
        ["PAN", "documents/c-1_PAN_20261020_083015.png", "PENDING"],
        ["AADHAAR", "documents/c-1_AADHAAR_20261020_083015.pdf", "PENDING"],
      ],
    );

    const candidate = await candidatesRepository.findById("c-1");
    assert.equal(candidate?.documentStatus, "SUBMITTED");
    assert.equal(candidate?.documentsSubmittedAt, NOW);

    const logs = await agentLogsRepository.listByCandidate("c-1");
    assert.equal(logs[0]?.action, "DOCUMENTS_SUBMITTED");
    assert.deepEqual(logs[0]?.input, {
      pan_file: "c-1_PAN_20261020_083015.png",
      aadhaar_file: "c-1_AADHAAR_20261020_083015.pdf",
    });
  });
});

test("refuses submissions outside the REQUESTED state", async () => {
  const cases: Array<[DocumentStatus, string]> = [
    ["NOT_REQUESTED", "Documents have not been requested for this candidate"],
    ["SUBMITTED", "Documents have already been submitted"],
    ["VERIFIED", "Documents have already been verified"],
  ];
  for (const [status, message] of cases) {
    await withHarness(status, async ({ service }) => {
      await assert.rejects(
        () => service.submitDocuments("c-1", { pan: upload("pan.png"), aadhaar: upload("aadhaar.png") }),
        { message },
      );
    });
  }
});

test("validates the uploaded files", async () => {
  await withHarness("REQUESTED", async ({ service, documentsRepository, candidatesRepository }) => {
    await assert.rejects(() => service.submitDocuments("c-1", { pan: upload("pan.png") }), {
      message: "Both PAN Card and Aadhaar Card are required",
    });
    await assert.rejects(
      () => service.submitDocuments("c-1", { pan: upload(""), aadhaar: upload("aadhaar.png") }),
      { message: "No files selected" },
    );
    await assert.rejects(
      () => service.submitDocuments("c-1", { pan: upload("pan.gif"), aadhaar: upload("aadhaar.png") }),
      { message: "Invalid file type. Only JPG, PNG, and PDF are allowed" },
    );
    await assert.rejects(
      () => service.submitDocuments("c-1", { pan: upload("pan.jpg", ""), aadhaar: upload("aadhaar.png") }),
      { message: "Uploaded files must not be empty" },
    );
    await assert.rejects(() => service.submitDocuments("missing", {}), { message: "Candidate not found" });

    assert.deepEqual(await documentsRepository.listByCandidate("c-1"), []);
    assert.equal((await candidatesRepository.findById("c-1"))?.documentStatus, "REQUESTED");
  });
});

test("a failed second write leaves no rows or files behind and a retry stores exactly two documents", async () => {
  let storage: FlakyFileStorage | undefined;
  await withHarness(
    "REQUESTED",
    async ({ service, dir, documentsRepository, candidatesRepository }) => {
      const submission = { pan: upload("pan.png"), aadhaar: upload("aadhaar.pdf") };
      await assert.rejects(() => service.submitDocuments("c-1", submission), {
        message: "Failed to store uploaded file",
      });

      assert.deepEqual(await documentsRepository.listByCandidate("c-1"), []);
      assert.deepEqual(await readdir(path.join(dir, "documents")), []);
      assert.equal((await candidatesRepository.findById("c-1"))?.documentStatus, "REQUESTED");

      await service.submitDocuments("c-1", submission);
      const documents = await documentsRepository.listByCandidate("c-1");
      assert.deepEqual(
        documents.map((document) => [document.documentType, document.verificationStatus]),
        [
          ["PAN", "PENDING"],
          ["AADHAAR", "PENDING"],
        ],
      );
      assert.equal(storage?.saves, 4);
    },
    (dir) => {
      storage = new FlakyFileStorage(dir, noopLogger);
      return storage;
    },
  );
});
