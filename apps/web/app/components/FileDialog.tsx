"use client";

import { Dialog, Transition } from "@headlessui/react";
import { keepPreviousData, useQuery } from "@tanstack/react-query";
import { Button, Input, Label } from "@quietcut/ui";
import clsx from "clsx";
import { Fragment, ReactNode, useState } from "react";
import { browseDirectory } from "@/lib/api";
import { ensureExtension, filtersFor, findFilter, joinPath, splitPath, type DialogKind } from "@/lib/dialogs";

interface FileDialogProps {
  open: boolean;
  dialog: DialogKind;
  title: string;
  /** A file path whose directory opens first; in save mode its name is prefilled. */
  initialPath?: string;
  onClose: () => void;
  onSelect: (path: string) => void;
}

export function FileDialog({ open, dialog, title, initialPath, onClose, onSelect }: FileDialogProps) {
  return (
    <ModalFrame open={open} onClose={onClose} title={title} wide>
      {open && (
        <FileBrowser
          dialog={dialog}
          initialPath={initialPath}
          onCancel={onClose}
          onSelect={(path) => {
            onSelect(path);
            onClose();
          }}
        />
      )}
    </ModalFrame>
  );
}

function FileBrowser({
  dialog,
  initialPath,
  onCancel,
  onSelect
}: {
  dialog: DialogKind;
  initialPath?: string;
  onCancel: () => void;
  onSelect: (path: string) => void;
}) {
  const initial = initialPath ? splitPath(initialPath) : null;
  const [directory, setDirectory] = useState<string | undefined>(initial?.directory || undefined);
  const [filterId, setFilterId] = useState(findFilter(dialog).id);
  const [fileName, setFileName] = useState(dialog === "save" ? initial?.name ?? "" : "");
  const filter = findFilter(dialog, filterId);

  const browse = useQuery({
    queryKey: ["browse", dialog, directory ?? "", filterId],
    queryFn: () => browseDirectory({ dir: directory, dialog, filter: filterId }),
    placeholderData: keepPreviousData,
    retry: false
  });

  const listing = browse.data?.listing;
  const saveTarget = listing && fileName.trim() ? joinPath(listing.directory, ensureExtension(fileName.trim(), filter)) : null;

  return (
    <div className="space-y-4">
      <div className="flex items-center gap-2">
        <Button
          variant="secondary"
          disabled={!listing?.parent}
          onClick={() => listing?.parent && setDirectory(listing.parent)}
          className="shrink-0 px-3"
        >
          Up
        </Button>
        <p className="truncate rounded-lg bg-black/50 px-3 py-2 font-mono text-xs text-zinc-300" title={listing?.directory}>
          {listing?.directory ?? directory ?? "…"}
        </p>
      </div>

      {browse.isError && (
        <div className="flex items-center justify-between rounded-lg border border-red-500/30 bg-red-500/10 px-3 py-2 text-xs text-red-300">
          <span>{browse.error.message}</span>
          <button type="button" className="underline" onClick={() => setDirectory(undefined)}>
            go home
          </button>
        </div>
      )}

      <ul className="h-72 overflow-y-auto rounded-xl border border-white/10 bg-black/40 text-sm">
        {listing?.entries.length === 0 && <li className="px-4 py-3 text-zinc-500">no matching files</li>}
        {listing?.entries.map((entry) => (
          <li key={entry.path}>
            <button
              type="button"
              onClick={() => {
                if (entry.kind === "directory") {
                  setDirectory(entry.path);
                } else if (dialog === "open") {
                  onSelect(entry.path);
                } else {
                  setFileName(entry.name);
                }
              }}
              className={clsx(
                "flex w-full items-center justify-between gap-3 px-4 py-2 text-left transition hover:bg-accent/15",
                dialog === "save" && entry.name === fileName && "bg-accent/20"
              )}
            >
              <span className="truncate">
                {entry.kind === "directory" ? "📁" : "🎞️"} {entry.name}
              </span>
              {entry.size !== null && <span className="shrink-0 text-xs text-zinc-500">{formatSize(entry.size)}</span>}
            </button>
          </li>
        ))}
      </ul>

      <div className="grid gap-3 sm:grid-cols-[1fr,auto]">
        {dialog === "save" ? (
          <div className="space-y-1">
            <Label htmlFor="save-name">file name</Label>
            <Input id="save-name" value={fileName} onChange={(event) => setFileName(event.target.value)} />
          </div>
        ) : (
          <div />
        )}
        <div className="space-y-1">
          <Label htmlFor="file-filter">type</Label>
          <select
            id="file-filter"
            value={filterId}
            onChange={(event) => setFilterId(event.target.value)}
            className="w-full rounded-lg border border-white/10 bg-black/60 px-3 py-2 text-sm text-white focus:border-accent focus:outline-none"
          >
            {filtersFor(dialog).map((option) => (
              <option key={option.id} value={option.id}>
                {option.label}
                {option.extensions.length ? ` (${option.extensions.map((ext) => `*.${ext}`).join(" ")})` : " (*)"}
              </option>
            ))}
          </select>
        </div>
      </div>

      <div className="flex justify-end gap-2">
        <Button variant="secondary" onClick={onCancel}>
          Cancel
        </Button>
        {dialog === "save" && (
          <Button disabled={!saveTarget} onClick={() => saveTarget && onSelect(saveTarget)}>
            Save
          </Button>
        )}
      </div>
    </div>
  );
}

function formatSize(bytes: number) {
  if (bytes >= 1024 * 1024 * 1024) {
    return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`;
  }
  if (bytes >= 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  }
  return `${Math.max(1, Math.round(bytes / 1024))} KB`;
}

export function ConfirmDialog({
  open,
  title,
  message,
  onConfirm,
  onCancel
}: {
  open: boolean;
  title: string;
  message: string;
  onConfirm: () => void;
  onCancel: () => void;
}) {
  return (
    <ModalFrame open={open} onClose={onCancel} title={title}>
      <p className="text-sm text-zinc-300">{message}</p>
      <div className="mt-6 flex justify-end gap-2">
        <Button variant="secondary" onClick={onCancel}>
          No
        </Button>
        <Button onClick={onConfirm}>Yes</Button>
      </div>
    </ModalFrame>
  );
}

function ModalFrame({
  open,
  onClose,
  title,
  wide = false,
  children
}: {
  open: boolean;
  onClose: () => void;
  title: string;
  wide?: boolean;
  children: ReactNode;
}) {
  return (
    <Transition appear show={open} as={Fragment}>
      <Dialog as="div" className="relative z-50" onClose={onClose}>
        <Transition.Child
          as={Fragment}
          enter="ease-out duration-200"
          enterFrom="opacity-0"
          enterTo="opacity-100"
          leave="ease-in duration-150"
          leaveFrom="opacity-100"
          leaveTo="opacity-0"
        >
          <div className="fixed inset-0 bg-black/70" />
        </Transition.Child>
        <div className="fixed inset-0 overflow-y-auto">
          <div className="flex min-h-full items-center justify-center p-4">
            <Transition.Child
              as={Fragment}
              enter="ease-out duration-200"
              enterFrom="scale-95 opacity-0"
              enterTo="scale-100 opacity-100"
              leave="ease-in duration-150"
              leaveFrom="scale-100 opacity-100"
              leaveTo="scale-95 opacity-0"
            >
              <Dialog.Panel
                className={clsx(
                  "w-full rounded-2xl border border-white/10 bg-panel p-6 shadow-[0_0_60px_rgba(102,126,234,0.2)]",
                  wide ? "max-w-2xl" : "max-w-md"
                )}
              >
                <Dialog.Title className="mb-4 text-lg font-semibold text-white">{title}</Dialog.Title>
                {children}
              </Dialog.Panel>
            </Transition.Child>
          </div>
        </div>
      </Dialog>
    </Transition>
  );
}
